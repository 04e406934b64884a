/**
 * Slipway Runtime Host — File-backed Build Log Sink
 *
 * Implements the kernel's LogSink by appending each BuildEvent, prefixed
 * with a ULID event_id, as one JSONL line to the project's
 * `logs/builds.jsonl`. The append is synchronous, so the event is on disk
 * before the pipeline moves to the next step.
 */

import type { BuildEvent, LogSink } from '@slipway/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const BUILD_LOG = 'builds.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly idFn: () => string = ulid,
  ) {}

  append(entry: BuildEvent): void {
    this.stateIO.appendLine(BUILD_LOG, JSON.stringify({ event_id: this.idFn(), ...entry }));
  }
}
