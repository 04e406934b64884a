/**
 * Slipway Runtime Host — Home and Engine Resolution
 *
 * The home directory holds per-project state:
 *
 *   <SLIPWAY_HOME>/
 *     projects/
 *       <contextId>/
 *         project.json
 *         state/layers.json
 *         logs/builds.jsonl
 *
 * Home precedence:
 *   1. Explicit option (the --home flag)
 *   2. SLIPWAY_HOME
 *   3. `home` in the OS config file
 *   4. ~/.slipway
 *
 * Engine precedence:
 *   1. Explicit option (the --engine flag)
 *   2. SLIPWAY_ENGINE
 *   3. `engine` in the OS config file
 *   4. docker
 */

import { mkdirSync, readFileSync } from 'node:fs';
import { homedir, platform } from 'node:os';
import { join } from 'node:path';
import { isNodeError } from './state/state-io.js';

export const HOME_ENV = 'SLIPWAY_HOME';
export const ENGINE_ENV = 'SLIPWAY_ENGINE';
export const DEFAULT_ENGINE = 'docker';

// ---------------------------------------------------------------------------
// OS Config File
// ---------------------------------------------------------------------------

/**
 * Platform config file location.
 *
 *   macOS:   ~/Library/Preferences/slipway/config.json
 *   Windows: %APPDATA%\slipway\config.json
 *   Linux:   $XDG_CONFIG_HOME/slipway/config.json (default ~/.config)
 */
export function getOsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'slipway', 'config.json');
    case 'win32':
      return join(env['APPDATA'] ?? join(home, 'AppData', 'Roaming'), 'slipway', 'config.json');
    default:
      return join(env['XDG_CONFIG_HOME'] ?? join(home, '.config'), 'slipway', 'config.json');
  }
}

export interface SlipwayOsConfig {
  readonly home?: string | undefined;
  readonly engine?: string | undefined;
}

/**
 * Read the OS config file. A missing or malformed file reads as empty;
 * unreadable files (permissions, I/O) are rethrown.
 */
export function readOsConfig(configPath: string): SlipwayOsConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err: unknown) {
    if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) return {};
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null) return {};
  const home = 'home' in parsed && typeof parsed.home === 'string' && parsed.home !== '' ? parsed.home : undefined;
  const engine =
    'engine' in parsed && typeof parsed.engine === 'string' && parsed.engine !== '' ? parsed.engine : undefined;
  return { home, engine };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** Explicit home override (highest precedence). */
  readonly home?: string | undefined;
  /** Explicit engine binary override (highest precedence). */
  readonly engine?: string | undefined;
  /** Environment to read; defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Config file to read; defaults to getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

/** Resolve the home directory, creating it if needed. */
export function resolveSlipwayHome(opts: ResolveOptions = {}): string {
  const env = opts.env ?? process.env;
  const home =
    nonEmpty(opts.home) ??
    nonEmpty(env[HOME_ENV]) ??
    readOsConfig(opts.configPath ?? getOsConfigPath(env)).home ??
    join(homedir(), '.slipway');

  mkdirSync(home, { recursive: true });
  return home;
}

/** Resolve the container engine binary. */
export function resolveEngine(opts: ResolveOptions = {}): string {
  const env = opts.env ?? process.env;
  return (
    nonEmpty(opts.engine) ??
    nonEmpty(env[ENGINE_ENV]) ??
    readOsConfig(opts.configPath ?? getOsConfigPath(env)).engine ??
    DEFAULT_ENGINE
  );
}
