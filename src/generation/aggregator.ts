/**
 * Test File Aggregator
 * ====================
 *
 * Merges generated Google Test fragments into one file per source file.
 *
 * Layout of a merged file:
 *   sorted unique #include lines
 *   test bodies, existing first
 *   main block, if either side had one (existing wins)
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { KeyedMutex } from '../infra/lock.js';
import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when a fragment or an existing file cannot be merged safely.
 * The target file is left untouched.
 */
export class MergeError extends Error {
  constructor(
    message: string,
    public readonly target_path: string,
    public readonly source: 'fragment' | 'existing'
  ) {
    super(message);
    this.name = 'MergeError';
  }
}

// =============================================================================
// Parsing
// =============================================================================

const INCLUDE_LINE = /^[ \t]*(#include\s*[<"][^>"\n]*[>"])[^\n]*$/gm;
const MAIN_SIGNATURE = /\bint\s+main\s*\([^)]*\)\s*\{/;

export interface TestFileParts {
  /**
   * Sorted, deduplicated include directives.
   */
  includes: string[];

  body: string;
  main?: string;
}

/**
 * Locate the main block as [start, end). The closing brace is found by
 * counting braces outside comments and literals.
 */
function findMainBlock(content: string): [number, number] | undefined {
  const code = maskNonCode(content);
  const signature = MAIN_SIGNATURE.exec(code);
  if (signature === null) return undefined;

  let depth = 0;
  for (let i = signature.index + signature[0].length - 1; i < code.length; i++) {
    if (code[i] === '{') depth++;
    else if (code[i] === '}') {
      depth--;
      if (depth === 0) return [signature.index, i + 1];
    }
  }
  return undefined;
}

/**
 * Split a test file into includes, bodies and main block.
 */
export function extractParts(content: string): TestFileParts {
  const includes = [
    ...new Set(Array.from(content.matchAll(INCLUDE_LINE), (m) => m[1]).filter((d): d is string => d !== undefined)),
  ].sort();

  const span = findMainBlock(content);
  let body = span !== undefined ? content.slice(0, span[0]) + content.slice(span[1]) : content;
  body = body.replace(INCLUDE_LINE, '').trim();

  const parts: TestFileParts = { includes, body };
  if (span !== undefined) parts.main = content.slice(span[0], span[1]);
  return parts;
}

/**
 * Merge a new fragment into existing file content.
 */
export function mergeTestContent(existing: string, fragment: string): string {
  const current = extractParts(existing);
  const incoming = extractParts(fragment);

  const includes = [...new Set([...current.includes, ...incoming.includes])].sort();
  let body = current.body;
  if (incoming.body) {
    body += '\n\n' + incoming.body;
  }

  let merged = includes.join('\n') + '\n\n' + body;
  const main = current.main ?? incoming.main;
  if (main !== undefined) {
    merged += '\n\n' + main;
  }

  return merged.trim() + '\n';
}

// =============================================================================
// Brace Balance
// =============================================================================

/**
 * Blank out comments and string/char literals, keeping offsets and newlines.
 */
function maskNonCode(source: string): string {
  return source.replace(/\/\/[^\n]*|\/\*[\s\S]*?\*\/|"(?:\\.|[^"\\\n])*"|'(?:\\.|[^'\\\n])*'/g, (m) =>
    m.replace(/[^\n]/g, ' ')
  );
}

/**
 * Whether `{` and `}` pair up, ignoring comments and literals.
 */
export function bracesBalanced(source: string): boolean {
  let depth = 0;
  for (const ch of maskNonCode(source)) {
    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

// =============================================================================
// Aggregator
// =============================================================================

export class TestFileAggregator {
  private readonly locks = new KeyedMutex();
  private readonly logger: MetricsCollector;

  constructor(logger?: MetricsCollector) {
    this.logger = logger ?? createMetricsCollector('aggregator');
  }

  /**
   * Merge a fragment into the file at targetPath, creating it when absent.
   * Calls for the same path run one at a time.
   *
   * @throws MergeError when either side has unbalanced braces
   */
  async aggregate(targetPath: string, fragment: string): Promise<void> {
    const key = resolve(targetPath);

    await this.locks.runExclusive(key, async () => {
      if (!bracesBalanced(fragment)) {
        throw new MergeError(`Generated fragment for ${targetPath} has unbalanced braces`, targetPath, 'fragment');
      }

      if (!(await exists(key))) {
        await mkdir(dirname(key), { recursive: true });
        await writeFile(key, fragment, 'utf-8');
        this.logger.info('Created aggregate test file', { path: targetPath });
        return;
      }

      const existing = await readFile(key, 'utf-8');
      if (!bracesBalanced(existing)) {
        throw new MergeError(`Existing file ${targetPath} has unbalanced braces`, targetPath, 'existing');
      }

      await writeFile(key, mergeTestContent(existing, fragment), 'utf-8');
      this.logger.info('Merged into aggregate test file', { path: targetPath });
    });
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
