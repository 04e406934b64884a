/**
 * Slipway Kernel — Build Logger
 *
 * Records one event per pipeline transition. With no sink injected (tests,
 * dry runs) record() is a no-op.
 */

import type { BuildEvent, BuildEventType } from '../types/event.js';
import type { PipelineState } from '../types/plan.js';
import type { LogSink } from './log-sink.js';

export class BuildLogger {
  constructor(
    private readonly buildId: string,
    private readonly sink?: LogSink,
    private readonly clockFn: () => string = () => new Date().toISOString(),
  ) {}

  record(
    eventType: BuildEventType,
    state: PipelineState | null,
    key: string | null,
    detail: string = '',
  ): void {
    const entry: BuildEvent = {
      build_id: this.buildId,
      event_type: eventType,
      state,
      key,
      detail,
      timestamp: this.clockFn(),
    };
    this.sink?.append(entry);
  }
}
