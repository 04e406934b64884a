/**
 * Slipway Kernel — Log Sink Interface
 *
 * The kernel owns the contract; the runtime host owns the implementation
 * (FileLogSink). The kernel never writes to disk directly.
 */

import type { BuildEvent } from '../types/event.js';

/**
 * A sink that receives and persists build events.
 *
 * append() must complete before the pipeline advances to the next step, so
 * the log always reflects every state the build actually reached.
 */
export interface LogSink {
  append(entry: BuildEvent): void;
}
