// src/breakpointConfig.ts
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  BreakpointTable,
  invalidConfigError, isBreakpointTable, isBreakpointValue, isTableLike, isTableValue, joinLocation,
  mapBreakpointTable,
} from './breakpoints';

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', 'data', 'breakpoints.yaml');

function firstInvalidLocation(table: Readonly<Record<string, unknown>>, parent: string): string | null {
  for (const [key, child] of Object.entries(table)) {
    const loc = joinLocation(parent, key);
    if (isTableLike(child)) {
      const inner = firstInvalidLocation(child, loc);
      if (inner !== null) return inner;
    } else if (!isBreakpointValue(child)) {
      return loc;
    }
  }
  return null;
}

function deepFreeze(table: BreakpointTable): BreakpointTable {
  for (const child of Object.values(table)) {
    if (typeof child !== 'object') continue;
    if (isTableValue(child)) deepFreeze(child);
    else Object.freeze(child);
  }
  return Object.freeze(table);
}

/**
 * Validates a raw table and returns a frozen copy.
 * The caller's object is left untouched.
 */
export function bindBreakpointTable(raw: unknown, source: string = 'inline'): BreakpointTable {
  if (!isTableLike(raw)) {
    throw invalidConfigError('Breakpoint config root must be a mapping', { source });
  }
  if (!isBreakpointTable(raw)) {
    const location = firstInvalidLocation(raw, '');
    throw invalidConfigError(
      `Breakpoint config has an invalid value at "${location}"; expected a number, a [min, max] range or a mapping`,
      { source, location }
    );
  }
  return deepFreeze(mapBreakpointTable(raw, n => n));
}

export function parseBreakpointConfig(text: string, source: string = 'inline'): BreakpointTable {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw invalidConfigError(`Breakpoint config is not valid YAML: ${reason}`, { source }, e);
  }
  return bindBreakpointTable(raw, source);
}

export function loadBreakpointConfigFile(filePath: string): BreakpointTable {
  const text = fs.readFileSync(filePath, 'utf8');
  const table = parseBreakpointConfig(text, filePath);
  console.info(`[breakpointConfig] Loaded ${Object.keys(table).length} device families from ${path.basename(filePath)}`);
  return table;
}

/** Bundled device table (data/breakpoints.yaml). */
export function loadDefaultBreakpoints(): BreakpointTable {
  return loadBreakpointConfigFile(DEFAULT_CONFIG_PATH);
}

/**
 * Each family named in `override` replaces the whole family in `base`;
 * families the override does not name are kept.
 */
export function overrideBreakpoints(base: BreakpointTable, override: unknown): BreakpointTable {
  if (!isTableLike(override)) {
    throw invalidConfigError('Breakpoint override must be a mapping', { source: 'override' });
  }
  return bindBreakpointTable({ ...base, ...override }, 'override');
}
