/**
 * Environment loading and typed readers used by every package's config module.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

import { ConfigurationError } from '@doc-relay/contracts';
import { parse } from 'dotenv';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

/**
 * Load variables from .env files (default: `.env` in cwd).
 * Later files win only when `override` is set; existing process values are kept unless overridden.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): Record<string, string> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const collected: Record<string, string> = {};

  for (const file of files) {
    if (!existsSync(file)) continue;

    let parsed: Record<string, string>;
    try {
      parsed = parse(readFileSync(file, 'utf8'));
    } catch (error: unknown) {
      throw new ConfigurationError(`Failed to parse env file ${file}`, { cause: error });
    }

    for (const [key, value] of Object.entries(parsed)) {
      if (override || collected[key] === undefined) {
        collected[key] = value;
      }

      if (assignToProcess && (override || process.env[key] === undefined)) {
        process.env[key] = value;
      }
    }
  }

  return collected;
}

export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v === '1' || v.toLowerCase() === 'true';
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : def;
}

export function readString(name: string, def: string): string;
export function readString(name: string, def?: string): string | undefined;
export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/**
 * Read one of a closed set of values; anything else is a configuration error.
 */
export function readEnum<const T extends readonly string[]>(
  name: string,
  allowed: T,
  def: T[number],
): T[number] {
  const v = process.env[name];
  if (v == null || v === '') return def;
  const match = allowed.find((candidate) => candidate === v);
  if (match === undefined) {
    throw new ConfigurationError(`${name} must be one of ${allowed.join(', ')} (got "${v}")`);
  }
  return match;
}
