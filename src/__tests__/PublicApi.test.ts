import {
  BreakpointError, UNBOUNDED, bindBreakpointTable, buildMediaCondition, resolveBreakpoint, wrapMediaBlock,
} from '../index';

import type { MediaInput, Orientation } from '../index';

test('type-only exports describe media inputs', () => {
  const orientation: Orientation = 'landscape';
  const input: MediaInput = { kind: 'orientation', value: orientation };
  expect(buildMediaCondition(input, bindBreakpointTable({ any: 1 }))).toBe('(orientation: landscape)');
});

test('package entry exposes resolution and emission together', () => {
  const table = bindBreakpointTable({ phone: [0, 599], wide: 1200 });

  expect(resolveBreakpoint('wide', table)).toEqual({ min: 1200, max: UNBOUNDED });
  expect(wrapMediaBlock(buildMediaCondition({ kind: 'device', path: 'phone' }, table), '.menu { display: none; }'))
    .toBe('@media (min-width: 0px) and (max-width: 599px) { .menu { display: none; } }');
  expect(() => resolveBreakpoint('tv', table)).toThrow(BreakpointError);
});
