import {
  bindBreakpointTable, loadDefaultBreakpoints, overrideBreakpoints, parseBreakpointConfig,
} from '../breakpointConfig';
import { resolveBreakpoint } from '../deviceResolver';
import { DEVICES, catchBreakpointError } from './breakpointFixtures';

describe('breakpoint config', () => {
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  test('bundled default table loads, is frozen and logs the load', () => {
    const table = loadDefaultBreakpoints();

    expect(Object.keys(table)).toEqual(['mobile', 'tablet', 'desktop', 'screen']);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.tablet)).toBe(true);
    expect(resolveBreakpoint('tablet', table)).toEqual({ min: 720, max: 1219 });
    expect(resolveBreakpoint('screen', table)).toEqual({ min: 0, max: null });
    expect(infoSpy).toHaveBeenCalledWith('[breakpointConfig] Loaded 4 device families from breakpoints.yaml');
  });

  test('YAML ~ is an open upper bound', () => {
    const table = parseBreakpointConfig('tablet:\n  portrait: [720, 959]\n  landscape: [960, ~]\n');
    expect(resolveBreakpoint('tablet', table)).toEqual({ min: 720, max: null });
  });

  test('invalid leaf is INVALID_CONFIG with its location', () => {
    const err = catchBreakpointError(() => parseBreakpointConfig('mobile:\n  portrait: small\n'));
    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.context).toEqual({ source: 'inline', location: 'mobile.portrait' });
  });

  test('inverted range is rejected at load time', () => {
    const err = catchBreakpointError(() => parseBreakpointConfig('a: [10, 5]\n', 'custom.yaml'));
    expect(err.context).toEqual({ source: 'custom.yaml', location: 'a' });
  });

  test('YAML timestamps are not tables', () => {
    const err = catchBreakpointError(() => parseBreakpointConfig('tablet: 2020-01-01\n'));
    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.context).toEqual({ source: 'inline', location: 'tablet' });
  });

  test('non-plain objects are rejected when binding', () => {
    expect(catchBreakpointError(() => bindBreakpointTable({ a: new Map() })).code).toBe('INVALID_CONFIG');
    expect(catchBreakpointError(() => bindBreakpointTable(new Date(0))).code).toBe('INVALID_CONFIG');
    expect(bindBreakpointTable({ a: Object.assign(Object.create(null), { x: [1, 2] }) })).toEqual({ a: { x: [1, 2] } });
  });

  test('root must be a mapping', () => {
    expect(catchBreakpointError(() => parseBreakpointConfig('- 1\n- 2\n')).code).toBe('INVALID_CONFIG');
    expect(catchBreakpointError(() => parseBreakpointConfig('')).code).toBe('INVALID_CONFIG');
  });

  test('YAML syntax errors keep the parser error as cause', () => {
    const err = catchBreakpointError(() => parseBreakpointConfig('mobile: [1, 2\n'));
    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.cause).toBeInstanceOf(Error);
  });

  test('binding copies: the caller object is not frozen', () => {
    const raw = { a: [1, 2] };
    const bound = bindBreakpointTable(raw);
    expect(Object.isFrozen(raw)).toBe(false);
    expect(Object.isFrozen(bound)).toBe(true);
    expect(bound).not.toBe(raw);
    expect(bound).toEqual(raw);
  });

  test('override replaces named families and keeps the rest', () => {
    const merged = overrideBreakpoints(DEVICES, { tablet: [700, 1000] });
    expect(resolveBreakpoint('tablet', merged)).toEqual({ min: 700, max: 1000 });
    expect(resolveBreakpoint('mobile', merged)).toEqual({ min: 320, max: 719 });
    expect(resolveBreakpoint('tablet', DEVICES)).toEqual({ min: 720, max: 1219 });
  });

  test('override must be a valid mapping', () => {
    expect(catchBreakpointError(() => overrideBreakpoints(DEVICES, [1, 2])).code).toBe('INVALID_CONFIG');
    expect(catchBreakpointError(() => overrideBreakpoints(DEVICES, { tablet: 'wide' })).code).toBe('INVALID_CONFIG');
  });
});
