// src/deviceResolver.ts
import {
  BreakpointPath, BreakpointRange, BreakpointTable, BreakpointValue,
  hasOwnKey, invalidPathError, isTableValue, unknownKeyError,
} from './breakpoints';
import { reduceBreakpoints } from './rangeReducer';

/**
 * Normalizes a path to its key list.
 * "mobile", "tablet.portrait", "tablet, portrait" and ['tablet', 'portrait'] are all accepted;
 * segments are trimmed in every form.
 */
export function parseBreakpointPath(path: BreakpointPath): readonly string[] {
  const segments: readonly string[] = typeof path === 'string' ? path.split(/[.,]/) : path;
  const keys = segments.map(s => s.trim());

  if (keys.length === 0) throw invalidPathError('Breakpoint path is empty', keys);
  if (keys.some(k => k.length === 0)) {
    throw invalidPathError(`Breakpoint path has an empty segment: "${keys.join('.')}"`, keys);
  }
  return keys;
}

/** Walks `path` into `root` and reduces whatever it lands on to a single envelope. */
export function resolveBreakpoint(path: BreakpointPath, root: BreakpointTable): BreakpointRange {
  const keys = parseBreakpointPath(path);
  let current: BreakpointValue = root;

  for (const [i, key] of keys.entries()) {
    if (!isTableValue(current)) {
      const leaf = keys.slice(0, i).join('.');
      throw invalidPathError(`Cannot descend past leaf "${leaf}" into "${key}"`, keys);
    }
    if (!hasOwnKey(current, key)) throw unknownKeyError(key, keys);
    current = current[key];
  }

  const location = keys.join('.');
  if (isTableValue(current)) return reduceBreakpoints(current, location);

  // leaf picked directly: same reduction path as a one-entry table
  const leafKey = keys[keys.length - 1];
  return reduceBreakpoints({ [leafKey]: current }, keys.slice(0, -1).join('.'));
}
