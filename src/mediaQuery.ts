// src/mediaQuery.ts
// Media conditions built from resolved envelopes, explicit thresholds or categories.
import {
  BreakpointPath, BreakpointRange, BreakpointTable, UNBOUNDED,
  invalidValueError, isFiniteNumber,
} from './breakpoints';
import { resolveBreakpoint } from './deviceResolver';
import { Orientation } from './responsive';

export interface MediaConditionOptions {
  /** Suffix for printed lengths; table values are assumed to be in this unit already. */
  unit?: string;
  /** e.g. 'screen' => "screen and (min-width: ...)" */
  mediaType?: string;
}

export type MediaInput =
  | { kind: 'device'; path: BreakpointPath }
  | { kind: 'min'; value: number }
  | { kind: 'between'; min: number; max: number }
  | { kind: 'orientation'; value: Orientation }
  | { kind: 'aspectRatio'; value: string };

const ASPECT_RATIO_RE = /^(\d+)\s*[/:]\s*(\d+)$/;

export function formatLength(n: number, unit: string = 'px'): string {
  return `${Number(n.toFixed(4))}${unit}`;
}

function withMediaType(features: string[], options: MediaConditionOptions): string {
  const parts = options.mediaType ? [options.mediaType, ...features] : features;
  return parts.length > 0 ? parts.join(' and ') : 'all';
}

/** Lower bound when finite; upper bound only when the range is closed. */
export function widthCondition(range: BreakpointRange, options: MediaConditionOptions = {}): string {
  const unit = options.unit ?? 'px';
  const features: string[] = [];
  if (Number.isFinite(range.min)) features.push(`(min-width: ${formatLength(range.min, unit)})`);
  if (range.max !== UNBOUNDED) features.push(`(max-width: ${formatLength(range.max, unit)})`);
  return withMediaType(features, options);
}

export function minWidthCondition(value: number, options: MediaConditionOptions = {}): string {
  if (!isFiniteNumber(value)) throw invalidValueError('min', value, 'minimum width must be a finite number');
  return widthCondition({ min: value, max: UNBOUNDED }, options);
}

export function betweenCondition(min: number, max: number, options: MediaConditionOptions = {}): string {
  if (!isFiniteNumber(min) || !isFiniteNumber(max)) {
    throw invalidValueError('between', [min, max], 'bounds must be finite numbers');
  }
  if (min > max) throw invalidValueError('between', [min, max], `minimum ${min} exceeds maximum ${max}`);
  return widthCondition({ min, max }, options);
}

export function orientationCondition(value: Orientation, options: MediaConditionOptions = {}): string {
  return withMediaType([`(orientation: ${value})`], options);
}

/** Accepts "16/9" or "16:9"; always printed as "16/9". */
export function aspectRatioCondition(value: string, options: MediaConditionOptions = {}): string {
  const m = ASPECT_RATIO_RE.exec(value.trim());
  if (!m || Number(m[2]) === 0) {
    throw invalidValueError('aspectRatio', value, 'expected "<width>/<height>" with a non-zero height');
  }
  return withMediaType([`(aspect-ratio: ${m[1]}/${m[2]})`], options);
}

export function buildMediaCondition(
  input: MediaInput,
  root: BreakpointTable,
  options: MediaConditionOptions = {}
): string {
  switch (input.kind) {
    case 'device': return widthCondition(resolveBreakpoint(input.path, root), options);
    case 'min': return minWidthCondition(input.value, options);
    case 'between': return betweenCondition(input.min, input.max, options);
    case 'orientation': return orientationCondition(input.value, options);
    case 'aspectRatio': return aspectRatioCondition(input.value, options);
    default: {
      const unhandled: never = input;
      throw new Error(`[mediaQuery] Unknown media input: ${JSON.stringify(unhandled)}`);
    }
  }
}

export function wrapMediaBlock(condition: string, body: string): string {
  return `@media ${condition} { ${body.trim()} }`;
}
