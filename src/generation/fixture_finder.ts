/**
 * Fixture Finder
 * ==============
 *
 * Locates an existing Google Test fixture class by name under a directory.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';

const SOURCE_EXTENSIONS = new Set(['.h', '.hpp', '.cpp', '.cc']);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class FixtureFinder {
  private readonly logger: MetricsCollector;

  constructor(logger?: MetricsCollector) {
    this.logger = logger ?? createMetricsCollector('fixtures');
  }

  /**
   * Source of `class <suite> : public ::testing::Test { ... };`, or undefined.
   * Files are visited in name order, depth first.
   */
  async find(suiteName: string, searchDir: string): Promise<string | undefined> {
    const pattern = new RegExp(
      `class\\s+${escapeRegExp(suiteName)}\\s*:\\s*public\\s+::testing::Test\\s*\\{[\\s\\S]*?\\};`
    );

    for (const file of await this.listSources(searchDir)) {
      let content: string;
      try {
        content = await readFile(file, 'utf-8');
      } catch (error) {
        this.logger.debug('Skipping unreadable file', { file, error: String(error) });
        continue;
      }
      const match = pattern.exec(content);
      if (match) {
        this.logger.info('Found existing fixture', { suite: suiteName, file });
        return match[0];
      }
    }
    return undefined;
  }

  private async listSources(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.debug('Fixture search directory unavailable', { dir, error: String(error) });
      return [];
    }

    const files: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.listSources(path)));
      } else if (entry.isFile() && SOURCE_EXTENSIONS.has(extname(entry.name))) {
        files.push(path);
      }
    }
    return files;
  }
}
