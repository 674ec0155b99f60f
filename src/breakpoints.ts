// src/breakpoints.ts
// Breakpoint value model shared by the reducer, the resolver and the config loader.

// ----------------- Value Types -----------------

/** `[min]` and `[min, null]` are open-ended ranges. */
export type RangeTuple =
  | readonly [number, number]
  | readonly [number, null]
  | readonly [number];

export type BreakpointValue = number | RangeTuple | BreakpointTable;

export interface BreakpointTable {
  readonly [key: string]: BreakpointValue;
}

export type BreakpointPath = string | readonly string[];

/** `null` max marks an unbounded range ("this wide and up"). */
export const UNBOUNDED = null;

export interface BreakpointRange {
  min: number;
  max: number | typeof UNBOUNDED;
}

// ----------------- Errors -----------------

export type BreakpointErrorCode =
  | 'INVALID_VALUE'
  | 'UNKNOWN_KEY'
  | 'INVALID_PATH'
  | 'INVALID_CONFIG';

export type BreakpointErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: BreakpointErrorContext): string {
  if (context === undefined) return message;
  return `${message} context=${JSON.stringify(context)}`;
}

export class BreakpointError extends Error {
  readonly code: BreakpointErrorCode;
  readonly context?: BreakpointErrorContext;

  constructor(
    code: BreakpointErrorCode,
    message: string,
    context?: BreakpointErrorContext,
    options?: { cause?: unknown }
  ) {
    super(formatMessage(message, context), options);
    this.name = 'BreakpointError';
    this.code = code;
    if (context !== undefined) this.context = context;
  }
}

export function invalidValueError(location: string, value: unknown, reason: string): BreakpointError {
  return new BreakpointError('INVALID_VALUE', `Invalid breakpoint value at "${location}": ${reason}`, {
    location,
    value: describeValue(value),
  });
}

export function unknownKeyError(key: string, path: readonly string[]): BreakpointError {
  return new BreakpointError('UNKNOWN_KEY', `Unknown breakpoint key "${key}"`, {
    key,
    path: path.join('.'),
  });
}

export function invalidPathError(message: string, path: readonly string[]): BreakpointError {
  return new BreakpointError('INVALID_PATH', message, { path: path.join('.') });
}

export function invalidConfigError(message: string, context?: BreakpointErrorContext, cause?: unknown): BreakpointError {
  return new BreakpointError('INVALID_CONFIG', message, context, cause === undefined ? undefined : { cause });
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'string') return `string "${value}"`;
  return typeof value;
}

// ----------------- Type Guards -----------------

export function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

export function isRangeTuple(v: unknown): v is RangeTuple {
  if (!Array.isArray(v)) return false;
  if (v.length === 1) return isFiniteNumber(v[0]);
  if (v.length !== 2) return false;
  const [lo, hi] = v;
  if (!isFiniteNumber(lo)) return false;
  if (hi === null) return true;
  return isFiniteNumber(hi) && lo <= hi;
}

/** Plain object only: arrays, Dates, Maps and class instances are not tables. */
export function isTableLike(v: unknown): v is Readonly<Record<string, unknown>> {
  if (typeof v !== 'object' || v === null || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function isBreakpointValue(v: unknown): v is BreakpointValue {
  return isFiniteNumber(v) || isRangeTuple(v) || isBreakpointTable(v);
}

export function isBreakpointTable(v: unknown): v is BreakpointTable {
  if (!isTableLike(v)) return false;
  return Object.values(v).every(isBreakpointValue);
}

export function hasOwnKey(table: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, key);
}

export function joinLocation(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

export function isTupleValue(v: BreakpointValue): v is RangeTuple {
  return Array.isArray(v);
}

export function isTableValue(v: BreakpointValue): v is BreakpointTable {
  return isTableLike(v);
}

// ----------------- Mapping -----------------

export function mapRangeTuple(t: RangeTuple, fn: (n: number) => number): RangeTuple {
  if (t.length === 1) return [fn(t[0])];
  const [lo, hi] = t;
  return hi === null ? [fn(lo), null] : [fn(lo), fn(hi)];
}

function mapValue(v: BreakpointValue, fn: (n: number) => number): BreakpointValue {
  if (typeof v === 'number') return fn(v);
  if (isTupleValue(v)) return mapRangeTuple(v, fn);
  return mapBreakpointTable(v, fn);
}

/** Structural copy with every numeric leaf passed through `fn`; `null` maxima stay `null`. */
export function mapBreakpointTable(table: BreakpointTable, fn: (n: number) => number): BreakpointTable {
  const out: Record<string, BreakpointValue> = {};
  for (const [key, child] of Object.entries(table)) {
    out[key] = mapValue(child, fn);
  }
  return out;
}
