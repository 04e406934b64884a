/**
 * Slipway Runtime Host — Project State
 *
 * Each build context is a project, identified by a hash of its absolute
 * path. Its layer cache index and build log live under
 * `<home>/projects/<contextId>/`.
 */

import { createHash } from 'node:crypto';
import { join, resolve } from 'node:path';
import { StateLayerCache } from '../cache/layer-store.js';
import { FileLogSink } from '../logging/file-log-sink.js';
import { FileStateIO, type StateIO } from './state-io.js';

export const PROJECT_FILE = 'project.json';

export function contextId(contextDir: string): string {
  return createHash('sha256').update(resolve(contextDir)).digest('hex').slice(0, 16);
}

export function projectDir(home: string, contextDir: string): string {
  return join(home, 'projects', contextId(contextDir));
}

export interface ProjectState {
  readonly id: string;
  readonly dir: string;
  readonly contextDir: string;
  readonly stateIO: StateIO;
  readonly cache: StateLayerCache;
  readonly sink: FileLogSink;
}

/** Bind the state of one build context. Nothing is written until used. */
export function openProject(home: string, contextDir: string, stateIO?: StateIO): ProjectState {
  const absolute = resolve(contextDir);
  const dir = projectDir(home, absolute);
  const io = stateIO ?? new FileStateIO(dir);
  return {
    id: contextId(absolute),
    dir,
    contextDir: absolute,
    stateIO: io,
    cache: new StateLayerCache(io),
    sink: new FileLogSink(io),
  };
}

/** Record which context a project directory belongs to. */
export function recordProject(project: ProjectState): void {
  project.stateIO.writeJson(PROJECT_FILE, { context: project.contextDir });
}
