/**
 * Dependency Ranker
 * =================
 *
 * Scores the functions, structures and macros a target touches so the
 * compressor can keep the most useful ones. Deterministic: the same input
 * always yields the same order and scores.
 */

import { dirname } from 'node:path';

import type {
  CalledFunction,
  DataStructure,
  FunctionDescriptor,
  MacroDefinition,
} from '../types/analysis.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Coarse importance derived from the numeric score.
 */
export type ImportanceLevel = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export type DependencyKind = 'function' | 'struct' | 'macro';

interface RankedBase<K extends DependencyKind, D> {
  name: string;
  kind: K;
  importance: ImportanceLevel;
  score: number;
  data: D;
}

export type RankedFunction = RankedBase<'function', CalledFunction>;
export type RankedStruct = RankedBase<'struct', DataStructure>;
export type RankedMacro = RankedBase<'macro', MacroDefinition>;

/**
 * A scored dependency. `data` is the analyzer record it was built from.
 */
export type RankedDependency = RankedFunction | RankedStruct | RankedMacro;

/**
 * Candidate records handed to `rank`.
 */
export interface DependencyCandidates {
  called_functions?: readonly CalledFunction[];
  data_structures?: readonly DataStructure[];
  macros_used?: readonly string[];
  macro_definitions?: readonly MacroDefinition[];
}

// =============================================================================
// Constants
// =============================================================================

export const RANKING_WEIGHTS = {
  same_directory: 2.0,
  complexity: 1.2,
  macro_complexity: 1.1,
} as const;

export const CRITICAL_BONUS = {
  function: 2.0,
  struct: 1.5,
  macro: 1.2,
} as const;

const MIN_SCORE = {
  function: 0.1,
  struct: 0.1,
  macro: 0.05,
} as const;

const CRITICAL_NAME_PATTERN =
  /malloc|free|alloc|dealloc|create|destroy|init|cleanup|error|assert|check|validate/i;

const IMPORTANCE_RANK: Record<ImportanceLevel, number> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

/**
 * Map a score onto an importance level.
 */
export function importanceForScore(score: number): ImportanceLevel {
  if (score >= 3.0) return 'CRITICAL';
  if (score >= 1.5) return 'HIGH';
  if (score >= 0.5) return 'MEDIUM';
  return 'LOW';
}

/**
 * Whether `level` is at or above `minimum`.
 */
export function meetsImportance(level: ImportanceLevel, minimum: ImportanceLevel): boolean {
  return IMPORTANCE_RANK[level] >= IMPORTANCE_RANK[minimum];
}

/**
 * Whether an identifier names an allocation, lifecycle or checking routine.
 */
export function isCriticalName(name: string): boolean {
  return CRITICAL_NAME_PATTERN.test(name);
}

// =============================================================================
// Ranker
// =============================================================================

/**
 * Ranks dependencies relative to one target function.
 */
export class DependencyRanker {
  private readonly targetDir: string | null;

  constructor(target: Pick<FunctionDescriptor, 'file'>) {
    this.targetDir = target.file ? dirname(target.file) : null;
  }

  /**
   * Rank every candidate, descending by score. Ties keep input order.
   */
  rank(candidates: DependencyCandidates): RankedDependency[] {
    const all: RankedDependency[] = [
      ...this.rankCalledFunctions(candidates.called_functions ?? []),
      ...this.rankDataStructures(candidates.data_structures ?? []),
      ...this.rankMacros(candidates.macros_used ?? [], candidates.macro_definitions ?? []),
    ];
    return sortByScore(all);
  }

  rankCalledFunctions(functions: readonly CalledFunction[]): RankedFunction[] {
    return sortByScore(
      functions.map((fn): RankedFunction => {
        const score = this.functionScore(fn);
        return { name: fn.name, kind: 'function', importance: importanceForScore(score), score, data: fn };
      })
    );
  }

  rankDataStructures(structures: readonly DataStructure[]): RankedStruct[] {
    return sortByScore(
      structures.map((ds): RankedStruct => {
        const score = this.structScore(ds);
        return { name: ds.name, kind: 'struct', importance: importanceForScore(score), score, data: ds };
      })
    );
  }

  /**
   * Rank macro names. Names without a definition record get an empty one.
   */
  rankMacros(names: readonly string[], definitions: readonly MacroDefinition[]): RankedMacro[] {
    const byName = new Map<string, MacroDefinition>();
    for (const def of definitions) {
      byName.set(def.name, def);
    }

    return sortByScore(
      names.map((name): RankedMacro => {
        const def = byName.get(name) ?? { name, definition: '' };
        const score = this.macroScore(name, def);
        return { name, kind: 'macro', importance: importanceForScore(score), score, data: def };
      })
    );
  }

  // ===========================================================================
  // Scoring
  // ===========================================================================

  private functionScore(fn: CalledFunction): number {
    let score = this.sameDirectoryBonus(fn.location);

    if (isCriticalName(fn.name)) {
      score += CRITICAL_BONUS.function;
    }

    let complexity = (fn.parameters?.length ?? 0) * 0.2;
    const returnType = fn.return_type ?? '';
    if (returnType.includes('*') || returnType.toLowerCase().includes('struct')) {
      complexity += 0.3;
    }
    score += complexity * RANKING_WEIGHTS.complexity;

    return Math.max(score, MIN_SCORE.function);
  }

  private structScore(ds: DataStructure): number {
    let score = this.sameDirectoryBonus(ds.location);

    const definition = ds.definition ?? '';
    const lowered = definition.toLowerCase();
    if (definition && (lowered.includes('struct') || lowered.includes('class'))) {
      score += definition.split('\n').length * 0.1;
    }

    if (isCriticalName(ds.name)) {
      score += CRITICAL_BONUS.struct;
    }

    return Math.max(score, MIN_SCORE.struct);
  }

  private macroScore(name: string, def: MacroDefinition): number {
    let score = this.sameDirectoryBonus(def.location);

    const definition = def.definition;
    if (definition.includes('(') && definition.includes(')')) {
      score += RANKING_WEIGHTS.macro_complexity * 2;
    }

    if (isCriticalName(name)) {
      score += CRITICAL_BONUS.macro;
    }

    if (splitWords(definition).length <= 3) {
      score *= 0.5;
    }

    return Math.max(score, MIN_SCORE.macro);
  }

  private sameDirectoryBonus(location: string | undefined): number {
    if (!this.targetDir || !location) {
      return 0;
    }
    return dirname(stripLine(location)) === this.targetDir ? RANKING_WEIGHTS.same_directory : 0;
  }
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Take at most `maxCount` entries at or above `minImportance`, in rank order.
 */
export function selectTop<T extends RankedDependency>(
  ranked: readonly T[],
  maxCount: number,
  minImportance: ImportanceLevel = 'LOW'
): T[] {
  const selected: T[] = [];
  for (const dep of ranked) {
    if (selected.length >= maxCount) break;
    if (meetsImportance(dep.importance, minImportance)) {
      selected.push(dep);
    }
  }
  return selected;
}

/**
 * Names of the entries `selectTop` would return.
 */
export function selectTopNames(
  ranked: readonly RankedDependency[],
  maxCount: number,
  minImportance: ImportanceLevel = 'LOW'
): string[] {
  return selectTop(ranked, maxCount, minImportance).map((dep) => dep.name);
}

// =============================================================================
// Helpers
// =============================================================================

function sortByScore<T extends RankedDependency>(items: T[]): T[] {
  return items.sort((a, b) => b.score - a.score);
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Drop a trailing `:line` or `:line:col` from a location.
 */
function stripLine(location: string): string {
  return location.replace(/(:\d+)+$/, '');
}
