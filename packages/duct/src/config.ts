/**
 * Parameter sources, lowest to highest precedence:
 *
 *   DEFAULT_PARAMS  <  --config file.json  <  --set name=value ...
 *
 * Everything is merged first and validated once.
 */

import * as fs from 'node:fs';
import { resolveParams, type DuctParams } from './params.js';

export interface ParamSources {
  /** Path to a JSON file holding a partial parameter object. */
  config?: string;
  /** `name=value` overrides. */
  set?: string[];
}

function readConfig(file: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new Error(`Cannot read config ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error(`Config ${file} must hold a JSON object of duct parameters`);
  }
  return { ...data };
}

/** Parse `name=value`. Values are numbers except for `easing`. */
export function parseAssignment(assignment: string): [string, string | number] {
  const eq = assignment.indexOf('=');
  if (eq <= 0) {
    throw new Error(`Invalid --set "${assignment}": expected name=value`);
  }
  const name = assignment.slice(0, eq).trim();
  const raw = assignment.slice(eq + 1).trim();
  if (name === 'easing') return [name, raw];
  const value = Number(raw);
  if (raw === '' || Number.isNaN(value)) {
    throw new Error(`Invalid --set "${assignment}": ${name} must be a number`);
  }
  return [name, value];
}

export function loadParams(sources: ParamSources = {}): DuctParams {
  const merged: Record<string, unknown> = sources.config ? readConfig(sources.config) : {};
  for (const assignment of sources.set ?? []) {
    const [name, value] = parseAssignment(assignment);
    merged[name] = value;
  }
  return resolveParams(merged);
}
