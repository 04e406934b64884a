/**
 * @slipway/runtime-host
 *
 * Side-effectful implementations of the kernel's adapter interfaces: the
 * subprocess adapter, the docker CLI build backend, probe and launcher,
 * build-context digests, and project-scoped state and logs.
 *
 * No kernel code imports from this package.
 */

// Subprocess execution
export { NodeExecAdapter } from './adapters/exec.js';

// Engine
export type { DockerBackendOptions } from './engine/docker-backend.js';
export {
  DockerCliBackend,
  LAYER_REPOSITORY,
  commitChanges,
  layerTag,
  resolveDestination,
} from './engine/docker-backend.js';
export type { ImageConfig } from './engine/image-config.js';
export { inspectImageConfig, parseEngineJson, parseEnvList, parseImageConfig } from './engine/image-config.js';
export { DockerProbe, bytecodeFindArgs, parsePackageList } from './engine/probe.js';
export type { LaunchOptions } from './engine/launcher.js';
export { ContainerLauncher } from './engine/launcher.js';

// Build context
export type { ContextEntry } from './context/digest.js';
export { computeBuildInputs, digestContext, digestFile, listContext } from './context/digest.js';
export type { StagedCopy } from './context/stage.js';
export { selectSource, stageCopy } from './context/stage.js';

// Recipe files
export type { InitResult } from './recipe/load.js';
export { RECIPE_FILE, initProject, loadManifest, loadRecipe } from './recipe/load.js';

// State
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { ProjectState } from './state/project-state.js';
export { PROJECT_FILE, contextId, openProject, projectDir, recordProject } from './state/project-state.js';
export { LAYER_INDEX, StateLayerCache } from './cache/layer-store.js';

// Home and engine resolution
export type { ResolveOptions, SlipwayOsConfig } from './home.js';
export {
  DEFAULT_ENGINE,
  ENGINE_ENV,
  HOME_ENV,
  getOsConfigPath,
  readOsConfig,
  resolveEngine,
  resolveSlipwayHome,
} from './home.js';

// Logging
export { BUILD_LOG, FileLogSink } from './logging/file-log-sink.js';
export { createUlid, ulid } from './logging/ulid.js';
export type {
  BuildStatus,
  BuildSummary,
  EventFilter,
  LogReadResult,
  LogReadStats,
  LoggedBuildEvent,
} from './logging/log-reader.js';
export { readLog, selectEvents, summarizeBuilds } from './logging/log-reader.js';
