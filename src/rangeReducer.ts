// src/rangeReducer.ts
import {
  BreakpointRange, UNBOUNDED,
  invalidValueError, isFiniteNumber, isTableLike, joinLocation,
} from './breakpoints';

type Entry = readonly [location: string, value: unknown];

// tracking start, not a default
const EMPTY_ACCUMULATOR: BreakpointRange = { min: Number.POSITIVE_INFINITY, max: Number.NEGATIVE_INFINITY };

/**
 * Merge one entry's range into the running envelope.
 * An unbounded max sticks: later bounded entries cannot close it again.
 */
function widen(acc: BreakpointRange, next: BreakpointRange): BreakpointRange {
  const min = Math.min(acc.min, next.min);
  if (acc.max === UNBOUNDED || next.max === UNBOUNDED) return { min, max: UNBOUNDED };
  return { min, max: Math.max(acc.max, next.max) };
}

function tupleRange(value: readonly unknown[], location: string): BreakpointRange {
  if (value.length !== 1 && value.length !== 2) {
    throw invalidValueError(location, value, 'a range needs one or two numbers');
  }
  const [lo, hi = UNBOUNDED] = value;
  if (!isFiniteNumber(lo)) throw invalidValueError(location, value, 'range minimum must be a finite number');
  if (hi === UNBOUNDED) return { min: lo, max: UNBOUNDED };
  if (!isFiniteNumber(hi)) throw invalidValueError(location, value, 'range maximum must be a finite number or null');
  if (lo > hi) throw invalidValueError(location, value, `range minimum ${lo} exceeds maximum ${hi}`);
  return { min: lo, max: hi };
}

function entryRange(value: unknown, location: string): BreakpointRange {
  if (isTableLike(value)) return reduceTable(value, location);
  if (Array.isArray(value)) return tupleRange(value, location);
  // bare number = "at least this wide"
  if (isFiniteNumber(value)) return { min: value, max: UNBOUNDED };
  throw invalidValueError(location, value, 'expected a number, a [min, max] range or a table');
}

function reduceEntries(entries: readonly Entry[], location: string): BreakpointRange {
  if (entries.length === 0) {
    throw invalidValueError(location || '<root>', {}, 'table has no entries');
  }
  return entries.reduce<BreakpointRange>(
    (acc, [loc, value]) => widen(acc, entryRange(value, loc)),
    EMPTY_ACCUMULATOR
  );
}

function reduceTable(table: Readonly<Record<string, unknown>>, location: string): BreakpointRange {
  const entries = Object.keys(table).map((key): Entry => [joinLocation(location, key), table[key]]);
  return reduceEntries(entries, location);
}

/**
 * Flattens a number, a range tuple or an arbitrarily nested table into one
 * `{ min, max }` envelope. `location` only labels errors.
 */
export function reduceBreakpoints(value: unknown, location: string = ''): BreakpointRange {
  if (isTableLike(value)) return reduceTable(value, location);
  return reduceEntries([[location || '<value>', value]], location);
}
