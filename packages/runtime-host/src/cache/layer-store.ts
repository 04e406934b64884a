/**
 * Slipway Runtime Host — Layer Cache Store
 *
 * Persists the kernel's LayerCache index to `state/layers.json` through a
 * project-scoped StateIO. Every put or evict rewrites the index, so the
 * file always matches what the last completed build recorded.
 *
 * Entries that fail shape validation on load are dropped; the layer they
 * referenced is simply rebuilt on the next run.
 */

import { PipelineState, parseLayerKey } from '@slipway/kernel';
import type { LayerCache, LayerCacheEntry, LayerKey } from '@slipway/kernel';
import type { StateIO } from '../state/state-io.js';

export const LAYER_INDEX = 'layers.json';

const STATES: ReadonlySet<string> = new Set(Object.values(PipelineState));

function isState(value: unknown): value is PipelineState {
  return typeof value === 'string' && STATES.has(value);
}

function toEntry(value: unknown): LayerCacheEntry | null {
  if (typeof value !== 'object' || value === null) return null;
  const r: Partial<Record<string, unknown>> = { ...value };
  const { key: rawKey, layer, state, recorded_at } = r;
  const key = typeof rawKey === 'string' ? parseLayerKey(rawKey) : null;
  if (key === null || !isState(state) || typeof recorded_at !== 'string') return null;
  if (typeof layer !== 'object' || layer === null || !('id' in layer) || typeof layer.id !== 'string') {
    return null;
  }
  return { key, layer: { id: layer.id }, state, recorded_at };
}

export class StateLayerCache implements LayerCache {
  private entries: Map<string, LayerCacheEntry> | null = null;

  constructor(private readonly stateIO: StateIO) {}

  get(key: LayerKey): LayerCacheEntry | undefined {
    return this.load().get(key);
  }

  put(entry: LayerCacheEntry): void {
    this.load().set(entry.key, entry);
    this.save();
  }

  evict(key: LayerKey): void {
    if (this.load().delete(key)) this.save();
  }

  list(): ReadonlyArray<LayerCacheEntry> {
    return [...this.load().values()];
  }

  private load(): Map<string, LayerCacheEntry> {
    if (this.entries !== null) return this.entries;
    const raw = this.stateIO.readJson(LAYER_INDEX, []);
    const entries = new Map<string, LayerCacheEntry>();
    if (Array.isArray(raw)) {
      for (const item of raw) {
        const entry = toEntry(item);
        if (entry !== null) entries.set(entry.key, entry);
      }
    }
    this.entries = entries;
    return entries;
  }

  private save(): void {
    this.stateIO.writeJson(LAYER_INDEX, this.list());
  }
}
