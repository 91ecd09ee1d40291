/**
 * CLI configuration.
 *
 * Fetch settings come from four layers, later ones winning:
 * built-in defaults < config file < environment < command-line flags.
 *
 * The config file lives at ~/.threadscope/config.json unless
 * THREADSCOPE_CONFIG names another path. Example:
 *
 *   {
 *     "userAgent": "Mozilla/5.0 (X11; Linux x86_64) ...",
 *     "timeoutMs": 20000,
 *     "maxAttempts": 4,
 *     "headers": { "Accept-Language": "de-DE" }
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_FETCH_CONFIG, ThreadscopeError, type FetchConfig } from './types.js';

export type FileConfig = Partial<FetchConfig>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Path of the config file: $THREADSCOPE_CONFIG, else ~/.threadscope/config.json
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.THREADSCOPE_CONFIG || join(homedir(), '.threadscope', 'config.json');
}

/**
 * Validate parsed config JSON. Unknown keys are ignored; a known key with the
 * wrong type is an error.
 */
export function parseConfig(raw: unknown, source = 'config'): FileConfig {
  if (!isRecord(raw)) {
    throw new ThreadscopeError(`${source}: expected a JSON object`, 'CONFIG');
  }

  const config: FileConfig = {};
  const invalid = (key: string, expected: string) =>
    new ThreadscopeError(`${source}: "${key}" must be ${expected}`, 'CONFIG');

  for (const key of ['userAgent', 'proxy'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') throw invalid(key, 'a non-empty string');
    config[key] = value;
  }

  for (const key of ['timeoutMs', 'maxAttempts'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isPositiveInteger(value)) throw invalid(key, 'a positive integer');
    config[key] = value;
  }

  if (raw.retryBaseDelayMs !== undefined) {
    const value = raw.retryBaseDelayMs;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw invalid('retryBaseDelayMs', 'a non-negative integer');
    }
    config.retryBaseDelayMs = value;
  }

  if (raw.headers !== undefined) {
    if (!isRecord(raw.headers)) throw invalid('headers', 'an object of strings');
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(raw.headers)) {
      if (typeof value !== 'string') throw invalid(`headers.${name}`, 'a string');
      headers[name] = value;
    }
    config.headers = headers;
  }

  return config;
}

/**
 * Load the config file. A missing file is an empty config; an unreadable or
 * invalid one throws ThreadscopeError with code CONFIG.
 */
export function loadConfig(path: string = getConfigPath()): FileConfig {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ThreadscopeError(`Could not read config file ${path}: ${detail}`, 'CONFIG');
  }
  return parseConfig(parsed, path);
}

/** Fetch settings from THREADSCOPE_USER_AGENT and THREADSCOPE_PROXY. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): FileConfig {
  const config: FileConfig = {};
  if (env.THREADSCOPE_USER_AGENT) config.userAgent = env.THREADSCOPE_USER_AGENT;
  if (env.THREADSCOPE_PROXY) config.proxy = env.THREADSCOPE_PROXY;
  return config;
}

/**
 * Layer partial configs over the defaults. Undefined values never override;
 * headers merge key by key.
 */
export function mergeFetchConfig(...layers: FileConfig[]): FetchConfig {
  const merged: FetchConfig = { ...DEFAULT_FETCH_CONFIG };
  for (const layer of layers) {
    if (layer.userAgent !== undefined) merged.userAgent = layer.userAgent;
    if (layer.proxy !== undefined) merged.proxy = layer.proxy;
    if (layer.timeoutMs !== undefined) merged.timeoutMs = layer.timeoutMs;
    if (layer.maxAttempts !== undefined) merged.maxAttempts = layer.maxAttempts;
    if (layer.retryBaseDelayMs !== undefined) merged.retryBaseDelayMs = layer.retryBaseDelayMs;
    if (layer.headers) merged.headers = { ...merged.headers, ...layer.headers };
  }
  return merged;
}

/**
 * Parse `-H "Name: value"` flags into a header map.
 */
export function parseHeaders(values: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const header of values) {
    const colonIndex = header.indexOf(':');
    const name = colonIndex > 0 ? header.slice(0, colonIndex).trim() : '';
    if (!name) {
      throw new ThreadscopeError(`Invalid header "${header}" (expected "Name: value")`, 'CONFIG');
    }
    headers[name] = header.slice(colonIndex + 1).trim();
  }
  return headers;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}
