// src/index.ts
export * from './breakpoints';
export { reduceBreakpoints } from './rangeReducer';
export { parseBreakpointPath, resolveBreakpoint } from './deviceResolver';
export {
  DEFAULT_CONFIG_PATH,
  bindBreakpointTable, parseBreakpointConfig, loadBreakpointConfigFile, loadDefaultBreakpoints, overrideBreakpoints,
} from './breakpointConfig';
export { DEFAULT_BASE_FONT_PX, pxToRelative, convertBreakpointTable } from './units';
export type { MediaConditionOptions, MediaInput } from './mediaQuery';
export {
  formatLength, widthCondition, minWidthCondition, betweenCondition,
  orientationCondition, aspectRatioCondition, buildMediaCondition, wrapMediaBlock,
} from './mediaQuery';
export type { Orientation } from './responsive';
export { computeOrientation, rangeContains, matchesBreakpoint, matchingFamilies } from './responsive';
