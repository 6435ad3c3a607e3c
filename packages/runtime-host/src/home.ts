/**
 * Mantle Runtime Host — MANTLE_HOME Resolution
 *
 * Resolves the Mantle home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. MANTLE_HOME environment variable
 *   3. OS application config file (stores the home from a prior persisted override)
 *   4. Default: ~/.mantle
 *
 * Layout under the resolved home:
 *
 *   <MANTLE_HOME>/
 *     state/
 *       catalog.json     last catalog saved by `mantle compile --save`
 *     logs/
 *       compiles.jsonl   one line per logged compilation
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir, platform } from 'node:os';
import { dirname, join } from 'node:path';
import { isNodeError } from './state/state-io.js';

export const MANTLE_HOME_ENV = 'MANTLE_HOME';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the Mantle application config file.
 *
 *   macOS:   ~/Library/Preferences/mantle/config.json
 *   Windows: %APPDATA%\mantle\config.json (fallback: ~/AppData/Roaming/mantle/config.json)
 *   Linux:   ~/.config/mantle/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'mantle', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'mantle', 'config.json');
    }
    default:
      return join(home, '.config', 'mantle', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

interface MantleOsConfig {
  readonly mantleHome: string;
}

function isMantleOsConfig(value: unknown): value is MantleOsConfig {
  return (
    typeof value === 'object' &&
    value !== null &&
    'mantleHome' in value &&
    typeof value.mantleHome === 'string' &&
    value.mantleHome !== ''
  );
}

/**
 * The persisted home from the OS config file, or null if the file is missing,
 * unreadable, or holds no `mantleHome` string.
 */
export function readMantleHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isMantleOsConfig(parsed) ? parsed.mantleHome : null;
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}

/**
 * Persist the home to the OS config file, creating its directory.
 */
export function writeMantleHomeToConfig(mantleHome: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  const config: MantleOsConfig = { mantleHome };
  writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveMantleHomeOptions {
  /** Explicit override, highest precedence. Typically from --home. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file so later invocations
   * without --home use it. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** Environment to read MANTLE_HOME from. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Config file location. Default: getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the Mantle home directory, creating it if it does not exist.
 *
 * @returns The resolved home directory path
 */
export function resolveMantleHome(opts: ResolveMantleHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? getOsConfigPath();
  const fromEnv = env[MANTLE_HOME_ENV];

  let mantleHome: string;
  if (opts.home !== undefined && opts.home !== '') {
    mantleHome = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    mantleHome = fromEnv;
  } else {
    mantleHome = readMantleHomeFromConfig(configPath) ?? join(homedir(), '.mantle');
  }

  if (!existsSync(mantleHome)) {
    mkdirSync(mantleHome, { recursive: true });
  }

  if (opts.persist === true) {
    writeMantleHomeToConfig(mantleHome, configPath);
  }

  return mantleHome;
}
