/**
 * Slipway Runtime Host — Build Log Reader
 *
 * Pure functions over the raw text of `builds.jsonl`:
 *
 *   LOGR-1: every well-formed event is parsed; malformed lines are counted
 *   LOGR-2: events are deduplicated by event_id, first seen wins
 *   LOGR-3: a trailing line without '\n' (interrupted write) is dropped
 *   LOGR-4: output is sorted by (timestamp, event_id)
 *
 * Callers obtain the raw text through StateIO.readLogRaw().
 */

import { BuildEventType, PipelineState, type BuildEvent } from '@slipway/kernel';

export interface LoggedBuildEvent extends BuildEvent {
  readonly event_id: string;
}

export interface LogReadStats {
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<LoggedBuildEvent>;
  readonly stats: LogReadStats;
}

const EVENT_TYPES: ReadonlySet<string> = new Set(Object.values(BuildEventType));
const STATES: ReadonlySet<string> = new Set(Object.values(PipelineState));

function isEventType(value: unknown): value is BuildEventType {
  return typeof value === 'string' && EVENT_TYPES.has(value);
}

function isState(value: unknown): value is PipelineState {
  return typeof value === 'string' && STATES.has(value);
}

function toEvent(value: unknown): LoggedBuildEvent | null {
  if (typeof value !== 'object' || value === null) return null;
  const r: Partial<Record<string, unknown>> = { ...value };
  const { event_id, build_id, event_type, state, key, detail, timestamp } = r;
  if (
    typeof event_id !== 'string' ||
    typeof build_id !== 'string' ||
    !isEventType(event_type) ||
    !(state === null || isState(state)) ||
    !(key === null || typeof key === 'string') ||
    typeof detail !== 'string' ||
    typeof timestamp !== 'string'
  ) {
    return null;
  }
  return { event_id, build_id, event_type, state, key, detail, timestamp };
}

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.trim() !== '');

  const seen = new Set<string>();
  const events: LoggedBuildEvent[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err: unknown) {
      if (!(err instanceof SyntaxError)) throw err;
      parseErrors++;
      continue;
    }
    const event = toEvent(parsed);
    if (event === null) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      events.push(event);
    }
  }

  events.sort((a, b) => compare(a.timestamp, b.timestamp) || compare(a.event_id, b.event_id));

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export interface EventFilter {
  readonly buildId?: string | undefined;
  /** Keep only the most recent N events. */
  readonly limit?: number | undefined;
}

export function selectEvents(
  events: ReadonlyArray<LoggedBuildEvent>,
  filter: EventFilter,
): ReadonlyArray<LoggedBuildEvent> {
  const matching = filter.buildId === undefined ? events : events.filter((e) => e.build_id === filter.buildId);
  if (filter.limit === undefined || filter.limit >= matching.length) return matching;
  return matching.slice(matching.length - filter.limit);
}

export type BuildStatus = 'succeeded' | 'failed' | 'incomplete';

export interface BuildSummary {
  readonly buildId: string;
  /** Tag requested at build start. */
  readonly tag: string;
  readonly startedAt: string;
  readonly status: BuildStatus;
  /** Last state reached. */
  readonly state: PipelineState | null;
  readonly cachedSteps: number;
  readonly appliedSteps: number;
  /** Error kind and message for failed builds, '' otherwise. */
  readonly error: string;
}

/** Fold sorted events into one summary per build, in start order. */
export function summarizeBuilds(events: ReadonlyArray<LoggedBuildEvent>): ReadonlyArray<BuildSummary> {
  const builds = new Map<string, BuildSummary>();
  for (const event of events) {
    const current = builds.get(event.build_id);
    if (event.event_type === BuildEventType.BuildStarted) {
      builds.set(event.build_id, {
        buildId: event.build_id,
        tag: event.detail,
        startedAt: event.timestamp,
        status: 'incomplete',
        state: null,
        cachedSteps: 0,
        appliedSteps: 0,
        error: '',
      });
      continue;
    }
    if (current === undefined) continue;

    switch (event.event_type) {
      case BuildEventType.StepCached:
        builds.set(event.build_id, { ...current, state: event.state, cachedSteps: current.cachedSteps + 1 });
        break;
      case BuildEventType.StepApplied:
        builds.set(event.build_id, { ...current, state: event.state, appliedSteps: current.appliedSteps + 1 });
        break;
      case BuildEventType.BuildSucceeded:
        builds.set(event.build_id, { ...current, status: 'succeeded' });
        break;
      case BuildEventType.BuildFailed:
        builds.set(event.build_id, { ...current, status: 'failed', error: event.detail });
        break;
      case BuildEventType.StepFailed:
        break;
    }
  }
  return [...builds.values()];
}
