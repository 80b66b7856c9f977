/**
 * Config File Reader
 *
 * Reads the TOML config document. Failures are returned as tagged results
 * carrying a human-readable message instead of being thrown.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { parse } from 'smol-toml';

export type ConfigErrorReason =
  | 'file-not-found'
  | 'read-error'
  | 'parse-error'
  | 'missing-section'
  | 'missing-field'
  | 'empty-field'
  | 'invalid-field';

export interface ConfigError {
  reason: ConfigErrorReason;
  message: string;
}

export type ConfigResult<T> = { ok: true; value: T } | { ok: false; error: ConfigError };

/**
 * Parsed TOML document: top-level keys map to sections or values
 */
export type ConfigDocument = Record<string, unknown>;

export function configError<T>(reason: ConfigErrorReason, message: string): ConfigResult<T> {
  return { ok: false, error: { reason, message } };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * A TOML table, as opposed to an array, a date or a scalar
 */
export function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Read and parse a TOML file (UTF-8)
 */
export async function readConfigDocument(path: string): Promise<ConfigResult<ConfigDocument>> {
  const absolutePath = resolve(path);

  let text: string;
  try {
    text = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return configError(
        'file-not-found',
        `config file ${absolutePath} not found. Copy config.example.toml to ${path} and fill in your credentials.`
      );
    }
    return configError('read-error', `failed to read config file ${absolutePath}: ${String(error)}`);
  }

  try {
    return { ok: true, value: parse(text) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return configError('parse-error', `failed to parse config file ${absolutePath}: ${reason}`);
  }
}
