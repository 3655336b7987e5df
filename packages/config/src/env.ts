/**
 * Centralized environment variable loader
 *
 * Locates the repo root and loads .env / .env.local deterministically.
 * Storage settings are read from process.env on every call, so nothing here
 * caches values beyond the one-time file load.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface EnvLoadResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>;
}

const SECRET_MARKERS = ['TOKEN', 'SECRET', 'PASSWORD', 'KEY'];

function isWorkspaceManifest(path: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch {
    return false;
  }
}

/**
 * Find repository root by walking up from the current directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && isWorkspaceManifest(packageJsonPath)) {
      return current;
    }
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

// CRLF, null bytes and other control chars (newline/tab excepted)
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function isSecretKey(key: string): boolean {
  return SECRET_MARKERS.some((marker) => key.includes(marker));
}

let cachedResult: EnvLoadResult | null = null;

function loadFile(
  path: string,
  label: string,
  keysLoaded: string[],
  keySources: Record<string, string>
): boolean {
  const result = config({ path, override: true });
  const parsed = result.parsed ?? {};
  const hasParsedValues = Object.keys(parsed).length > 0;

  for (const [key, value] of Object.entries(parsed)) {
    if (value.trim().length > 0) {
      keySources[key] = label;
      if (!keysLoaded.includes(key)) {
        keysLoaded.push(key);
      }
    }
  }

  if (result.error && !hasParsedValues) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
    return false;
  }
  return true;
}

/**
 * Initialize environment variables
 *
 * Loads <repo-root>/.env, then <repo-root>/.env.local on top of it.
 * A variable that was already set to a non-empty value is never replaced by
 * an empty value from either file.
 */
export function initEnv(envFileOverride?: string): EnvLoadResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot();
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };
  return cachedResult;
}

/**
 * Trimmed environment value, or the fallback when unset or blank
 */
export function readEnv(key: string, fallback = ''): string {
  const value = process.env[key];
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(keys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = process.env[key];
    if (!value || value.trim().length === 0) {
      return { key, present: false };
    }
    const trimmed = value.trim();
    return {
      key,
      present: true,
      length: trimmed.length,
      maskedValue: isSecretKey(key) ? maskValue(trimmed) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of keys) {
    const value = process.env[key];
    if (!value) continue;
    if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    keys: statuses,
    warnings,
  };
}
