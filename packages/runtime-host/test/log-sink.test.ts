/**
 * Slipway Runtime Host — Build Log Writing Tests
 *
 *   ULID-1: identifiers are 26 Crockford Base32 characters
 *   ULID-2: within one millisecond the random part is incremented
 *   ULID-3: a clock that moves backwards never reorders identifiers
 *   LOG-1:  each event is one JSONL line prefixed with its event_id
 *
 * Isolation: MemoryStateIO, injected clocks and random sources.
 */

import { describe, it, expect } from 'vitest';
import { BuildEventType, BuildLogger, PipelineState } from '@slipway/kernel';
import { BUILD_LOG, FileLogSink } from '../src/logging/file-log-sink.js';
import { createUlid, ulid } from '../src/logging/ulid.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const zeroes = (size: number): Uint8Array => new Uint8Array(size);

describe('ULID generation', () => {
  it('ULID-1: default generator yields increasing Crockford identifiers', () => {
    const first = ulid();
    const second = ulid();
    expect(first).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(second > first).toBe(true);
  });

  it('ULID-2: increments the random part within one millisecond', () => {
    const next = createUlid(() => 0, zeroes);
    expect(next()).toBe('00000000000000000000000000');
    expect(next()).toBe('00000000000000000000000001');
    expect(next()).toBe('00000000000000000000000002');
  });

  it('ULID-2: a new millisecond draws a new random part', () => {
    const times = [0, 1];
    const next = createUlid(() => times.shift() ?? 1, (size) => new Uint8Array(size).fill(0xff));
    expect(next()).toBe('0000000000ZZZZZZZZZZZZZZZZ');
    expect(next()).toBe('0000000001ZZZZZZZZZZZZZZZZ');
  });

  it('ULID-3: keeps the last timestamp when the clock goes back', () => {
    const times = [5, 3];
    const next = createUlid(() => times.shift() ?? 3, zeroes);
    expect(next()).toBe('00000000050000000000000000');
    expect(next()).toBe('00000000050000000000000001');
  });
});

describe('FileLogSink', () => {
  it('LOG-1: appends one line per event with the event_id first', () => {
    const io = new MemoryStateIO();
    const sink = new FileLogSink(io, () => 'EVT-1');

    sink.append({
      build_id: 'build-1',
      event_type: BuildEventType.BuildStarted,
      state: null,
      key: null,
      detail: 'demo:1',
      timestamp: '2026-01-01T00:00:00.000Z',
    });

    expect(io.readLines(BUILD_LOG)).toEqual([
      '{"event_id":"EVT-1","build_id":"build-1","event_type":"build_started","state":null,' +
        '"key":null,"detail":"demo:1","timestamp":"2026-01-01T00:00:00.000Z"}',
    ]);
  });

  it('LOG-1: receives the BuildLogger stream', () => {
    const io = new MemoryStateIO();
    let n = 0;
    const sink = new FileLogSink(io, () => `EVT-${++n}`);
    const logger = new BuildLogger('build-1', sink, () => '2026-01-01T00:00:00.000Z');

    logger.record(BuildEventType.BuildStarted, null, null, 'demo:1');
    logger.record(BuildEventType.StepApplied, PipelineState.BaseSelected, 'k0', 'slipway-layer:k0');

    const parsed: unknown[] = io.readLines(BUILD_LOG).map((l) => JSON.parse(l));
    expect(parsed).toEqual([
      expect.objectContaining({ event_id: 'EVT-1', event_type: 'build_started', detail: 'demo:1' }),
      expect.objectContaining({ event_id: 'EVT-2', event_type: 'step_applied', state: 'BaseSelected', key: 'k0' }),
    ]);
  });
});
