/**
 * Slipway Kernel — Build Event Types
 *
 * Every state transition of a build produces exactly one BuildEvent,
 * whether the step was served from cache, applied, or failed.
 */

import type { PipelineState } from './plan.js';

export enum BuildEventType {
  BuildStarted = 'build_started',
  StepCached = 'step_cached',
  StepApplied = 'step_applied',
  StepFailed = 'step_failed',
  BuildSucceeded = 'build_succeeded',
  BuildFailed = 'build_failed',
}

export interface BuildEvent {
  readonly build_id: string;
  readonly event_type: BuildEventType;
  /** Pipeline state the event refers to. Null for build-level events. */
  readonly state: PipelineState | null;
  /** Layer key of the step. Null for build-level events. */
  readonly key: string | null;
  /** Free-form detail: tag, error kind and message, or layer id. */
  readonly detail: string;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
}
