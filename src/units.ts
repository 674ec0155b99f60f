// src/units.ts
// Unit conversion lives outside the resolver: tables are converted once, before binding.
import { BreakpointTable, isFiniteNumber, mapBreakpointTable } from './breakpoints';
import { bindBreakpointTable } from './breakpointConfig';

export const DEFAULT_BASE_FONT_PX = 16;

/** px -> em/rem against the root font size. */
export function pxToRelative(px: number, basePx: number = DEFAULT_BASE_FONT_PX): number {
  if (!isFiniteNumber(basePx) || basePx <= 0) {
    throw new Error(`[units] Base font size must be a positive number, got ${basePx}`);
  }
  return px / basePx;
}

/** Returns a new bound table with every numeric leaf passed through `convert`. */
export function convertBreakpointTable(
  table: BreakpointTable,
  convert: (px: number) => number = px => pxToRelative(px)
): BreakpointTable {
  return bindBreakpointTable(mapBreakpointTable(table, convert), 'converted');
}
