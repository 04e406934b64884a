/**
 * Slipway Kernel — Layer Types
 *
 * Layers are identified by a LayerKey: a SHA-256 over the parent key, the
 * step's instructions, and the digest of whatever the step copies in. A key
 * is therefore stable exactly as long as every input that produced the layer
 * is unchanged.
 */

import type { PipelineState } from './plan.js';

// ---------------------------------------------------------------------------
// Branded Types
// ---------------------------------------------------------------------------

declare const __layerKeyBrand: unique symbol;

/**
 * A branded SHA-256 hex digest identifying a layer by its inputs.
 *
 * Only computeLayerKey() and parseLayerKey() in plan/cache-key.ts produce
 * values of this type.
 */
export type LayerKey = string & {
  readonly [__layerKeyBrand]: 'LayerKey';
};

// ---------------------------------------------------------------------------
// Layer References
// ---------------------------------------------------------------------------

/** An engine-side handle to a committed layer (image id or local tag). */
export interface LayerRef {
  readonly id: string;
}

export interface LayerCacheEntry {
  readonly key: LayerKey;
  readonly layer: LayerRef;
  readonly state: PipelineState;
  /** ISO 8601 timestamp of when the layer was recorded. */
  readonly recorded_at: string;
}

/**
 * Content-keyed index of previously committed layers.
 *
 * Entries are only written after a build completes. A failed build never
 * leaves a cache entry behind.
 */
export interface LayerCache {
  get(key: LayerKey): LayerCacheEntry | undefined;
  put(entry: LayerCacheEntry): void;
  /** Drop an entry whose layer no longer exists on the engine. */
  evict(key: LayerKey): void;
  list(): ReadonlyArray<LayerCacheEntry>;
}
