// src/responsive.ts
import { BreakpointPath, BreakpointRange, BreakpointTable, UNBOUNDED } from './breakpoints';
import { resolveBreakpoint } from './deviceResolver';

export type Orientation = 'portrait' | 'landscape';

export function computeOrientation(width: number, height: number): Orientation {
  return height >= width ? 'portrait' : 'landscape';
}

export function rangeContains(range: BreakpointRange, width: number): boolean {
  if (width < range.min) return false;
  return range.max === UNBOUNDED || width <= range.max;
}

/** Runtime counterpart of a device media condition. */
export function matchesBreakpoint(width: number, path: BreakpointPath, root: BreakpointTable): boolean {
  return rangeContains(resolveBreakpoint(path, root), width);
}

/** Top-level families whose envelope contains `width`, in table order. */
export function matchingFamilies(width: number, root: BreakpointTable): string[] {
  return Object.keys(root).filter(family => matchesBreakpoint(width, [family], root));
}
