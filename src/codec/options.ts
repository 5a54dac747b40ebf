import { DumpsOptions, Replacer } from './types.js';

function sortKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

/**
 * Folds `replacer` and `sortKeys` into the single replacer function a
 * JSON-style `stringify` takes. Key order follows insertion, so integer-like
 * keys still come first.
 */
export function composeReplacer(options: DumpsOptions): Replacer | undefined {
  const { replacer } = options;
  if (!options.sortKeys) return replacer;
  if (!replacer) return sortKeys;
  return (key, value) => sortKeys(key, replacer(key, value));
}
