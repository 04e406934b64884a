/**
 * Slipway Kernel — Pipeline Runner
 *
 * Runs a BuildPlan step by step against a BuildBackend.
 *
 * Runner contract:
 * 1. The plan's privilege order is checked before any step runs.
 * 2. Steps run strictly in order; each blocks until complete.
 * 3. A step whose key is in the LayerCache, and whose layer still exists
 *    on the engine, is reused without re-executing.
 * 4. The first failure halts the build. Layers created during this run are
 *    discarded, nothing is written to the cache, and no tag is applied.
 *    Backends name layers per build, so only this run's layers go.
 * 5. On success the final layer is tagged first, then every new layer is
 *    recorded in the cache.
 * 6. Every transition is recorded through the BuildLogger.
 */

import { randomUUID } from 'node:crypto';
import type { BuildBackend } from '../adapters/index.js';
import { BuildLogger } from '../logging/build-log.js';
import type { LogSink } from '../logging/log-sink.js';
import { assertPrivilegeOrder } from '../plan/builder.js';
import { computeLayerKey, stepInput, type BuildInputs } from '../plan/cache-key.js';
import {
  BuildError,
  BuildErrorKind,
  toBuildError,
  type BuildOutcome,
  type StepReport,
  type StepResult,
} from '../types/build.js';
import { BuildEventType } from '../types/event.js';
import type { LayerCache, LayerCacheEntry, LayerKey, LayerRef } from '../types/layer.js';
import type { BuildPlan, PipelineState } from '../types/plan.js';

export interface BuildRequest {
  readonly tag: string;
  /** Absolute path of the build context on the host. */
  readonly contextDir: string;
  readonly inputs: BuildInputs;
  /** Execute every step even when a cached layer exists. */
  readonly noCache?: boolean | undefined;
}

export interface PipelineOptions {
  readonly sink?: LogSink | undefined;
  readonly idFn?: (() => string) | undefined;
  readonly clockFn?: (() => string) | undefined;
  readonly nowMs?: (() => number) | undefined;
}

interface CreatedLayer {
  readonly key: LayerKey;
  readonly layer: LayerRef;
  readonly state: PipelineState;
}

export class BuildPipeline {
  private readonly idFn: () => string;
  private readonly clockFn: () => string;
  private readonly nowMs: () => number;

  constructor(
    private readonly backend: BuildBackend,
    private readonly cache: LayerCache,
    private readonly options: PipelineOptions = {},
  ) {
    this.idFn = options.idFn ?? (() => randomUUID());
    this.clockFn = options.clockFn ?? (() => new Date().toISOString());
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async run(plan: BuildPlan, request: BuildRequest): Promise<BuildOutcome> {
    const buildId = this.idFn();
    const logger = new BuildLogger(buildId, this.options.sink, this.clockFn);
    logger.record(BuildEventType.BuildStarted, null, null, request.tag);

    const reports: StepReport[] = [];
    const created: CreatedLayer[] = [];
    let reached: PipelineState | null = null;

    const fail = async (error: BuildError): Promise<BuildOutcome> => {
      const discarded = await this.discard(created);
      const final = discarded === null
        ? error
        : new BuildError(error.kind, error.message, joinDetail(error.detail, discarded), error.state);
      logger.record(BuildEventType.BuildFailed, reached, null, `${final.kind}: ${final.message}`);
      return { ok: false, buildId, state: reached, error: final, steps: reports };
    };

    try {
      assertPrivilegeOrder(plan);
    } catch (err: unknown) {
      return fail(toBuildError(err, BuildErrorKind.PrivilegeViolation));
    }

    let parentKey: LayerKey | null = null;
    let parent: LayerRef | null = null;

    for (const step of plan.steps) {
      const key = computeLayerKey(parentKey, step.instructions, stepInput(step, request.inputs));
      const started = this.nowMs();

      const hit = request.noCache === true ? undefined : await this.lookup(key);
      if (hit !== undefined) {
        parent = hit.layer;
        parentKey = key;
        reached = step.state;
        reports.push({ state: step.state, key, cached: true, durationMs: this.nowMs() - started });
        logger.record(BuildEventType.StepCached, step.state, key, hit.layer.id);
        continue;
      }

      let result: StepResult;
      try {
        result = await this.backend.apply(step, parent, {
          key,
          buildId,
          contextDir: request.contextDir,
          ignore: plan.ignore,
          workdir: plan.workdir,
        });
      } catch (err: unknown) {
        result = { ok: false, error: toBuildError(err, step.failure) };
      }

      if (!result.ok) {
        const error = result.error.state === null ? result.error.atState(step.state) : result.error;
        logger.record(BuildEventType.StepFailed, step.state, key, `${error.kind}: ${error.message}`);
        return fail(error);
      }

      created.push({ key, layer: result.layer, state: step.state });
      parent = result.layer;
      parentKey = key;
      reached = step.state;
      reports.push({ state: step.state, key, cached: false, durationMs: this.nowMs() - started });
      logger.record(BuildEventType.StepApplied, step.state, key, result.layer.id);
    }

    if (parent === null) {
      return fail(new BuildError(BuildErrorKind.InvalidRecipe, 'plan has no steps'));
    }

    try {
      await this.backend.tag(parent, request.tag);
    } catch (err: unknown) {
      const error = toBuildError(err, BuildErrorKind.FilesystemCopy);
      return fail(reached === null ? error : error.atState(reached));
    }

    const recordedAt = this.clockFn();
    for (const { key, layer, state } of created) {
      const entry: LayerCacheEntry = { key, layer, state, recorded_at: recordedAt };
      this.cache.put(entry);
    }

    logger.record(BuildEventType.BuildSucceeded, reached, parentKey, request.tag);
    return { ok: true, buildId, tag: request.tag, layer: parent, steps: reports };
  }

  /** A cache entry is usable only while its layer still exists. */
  private async lookup(key: LayerKey): Promise<LayerCacheEntry | undefined> {
    const entry = this.cache.get(key);
    if (entry === undefined) return undefined;
    if (await this.backend.exists(entry.layer)) return entry;
    this.cache.evict(key);
    return undefined;
  }

  /**
   * Remove the layers created by this run. Returns a diagnostic when the
   * backend could not remove them, so the caller can surface it.
   */
  private async discard(created: ReadonlyArray<CreatedLayer>): Promise<string | null> {
    if (created.length === 0) return null;
    try {
      await this.backend.discard(created.map((c) => c.layer));
      return null;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return `failed to discard intermediate layers: ${message}`;
    }
  }
}

function joinDetail(detail: string, extra: string): string {
  return detail === '' ? extra : `${detail}\n${extra}`;
}
