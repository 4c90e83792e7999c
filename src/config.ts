import type { RowHeuristic } from './treemap/types';
import { LayoutInputError } from './treemap/errors';

export interface LayoutOptions {
  heuristic?: RowHeuristic;
  debug?: boolean;
}

export type ResolvedLayoutOptions = Required<LayoutOptions>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_LAYOUT_OPTIONS: ResolvedLayoutOptions = {
  heuristic: 'greedy',
  debug: false,
};

const HEURISTICS: readonly RowHeuristic[] = ['greedy', 'trial', 'legacy'];

export function isRowHeuristic(value: string): value is RowHeuristic {
  return HEURISTICS.some(h => h === value);
}

export function readEnv(): Env {
  return typeof process !== 'undefined' ? process.env : {};
}

/**
 * Fill in defaults, then apply `TREEMAP_HEURISTIC` / `TREEMAP_DEBUG` from the
 * environment. Environment wins so a running app can be switched without code changes.
 */
export function resolveLayoutOptions(options: LayoutOptions = {}, env: Env = readEnv()): ResolvedLayoutOptions {
  const resolved: ResolvedLayoutOptions = { ...DEFAULT_LAYOUT_OPTIONS };
  if (options.heuristic !== undefined) resolved.heuristic = options.heuristic;
  if (options.debug !== undefined) resolved.debug = options.debug;

  const heuristic = env.TREEMAP_HEURISTIC?.trim();
  if (heuristic) {
    if (!isRowHeuristic(heuristic)) {
      throw new LayoutInputError(
        `TREEMAP_HEURISTIC must be one of ${HEURISTICS.join(', ')} (got "${heuristic}")`,
      );
    }
    resolved.heuristic = heuristic;
  }

  const debug = env.TREEMAP_DEBUG?.trim().toLowerCase();
  if (debug) resolved.debug = debug === '1' || debug === 'true';

  return resolved;
}
