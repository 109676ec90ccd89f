/**
 * @article2video/core
 *
 * Pipeline orchestrator, render backends and collaborator adapters that turn
 * a fetched article into a narrated video.
 *
 * Usage:
 *   import { loadConfig, createOrchestrator } from '@article2video/core';
 *   const orchestrator = createOrchestrator(loadConfig());
 *   orchestrator.on('stage:complete', (e) => console.log(e.stage, e.durationMs));
 *   const run = await orchestrator.run({ articleId: 123 });
 */

// --- Domain ---
export * from './types.js';

// --- Errors ---
export {
  PipelineFailure,
  ConfigurationError,
  NotFoundError,
  TransientAPIError,
  UpstreamAPIError,
  RemoteRenderError,
  RemoteRenderFailedError,
  RemoteRenderTimeoutError,
  LocalRenderError,
  PublishError,
  RunInProgressError,
  RunCancelledError,
  toError,
  errorCode,
} from './errors.js';

// --- Config ---
export {
  PipelineConfigSchema,
  LLMConfigSchema,
  TTSConfigSchema,
  ASRConfigSchema,
  ImageConfigSchema,
  ArticleSourceConfigSchema,
  RemoteRenderConfigSchema,
  OutputConfigSchema,
  PublishConfigSchema,
  RetryConfigSchema,
  LOCAL_CONFIG_FILE,
  loadConfig,
  envLayer,
  isPublishConfigured,
  type PipelineConfig,
  type PipelineConfigInput,
  type LLMConfig,
  type TTSConfig,
  type ASRConfig,
  type ImageConfig,
  type ArticleSourceConfig,
  type RemoteRenderConfig,
  type OutputConfig,
  type PublishConfig,
  type RetryConfig,
  type EnvSource,
  type LoadConfigOptions,
} from './config.js';

// --- Context & events ---
export {
  ConsoleLogger,
  silentLogger,
  type LogLevel,
  type Logger,
  type PipelineContext,
  type StageContext,
} from './context.js';
export {
  PipelineEmitter,
  type PipelineEventMap,
  type PipelineEventName,
} from './events.js';

// --- Stage runner, cache, lock ---
export { executeWithRetry, NO_RETRY, type RetryPolicy, type RetryHooks } from './stage.js';
export {
  FileArtifactStore,
  MemoryArtifactStore,
  type ArtifactCache,
  type ArtifactKind,
  type ArtifactRecords,
  type ArtifactStore,
} from './store.js';
export { RunLock, type ReleaseFn } from './lock.js';

// --- Collaborators ---
export type {
  ArticleSource,
  ScriptGenerator,
  AudioSynthesizer,
  SubtitleAligner,
  BackgroundArtist,
  MetadataGenerator,
  Publisher,
  Notifier,
} from './collaborators.js';
export * from './stages/index.js';

// --- Rendering ---
export { VIDEO_FILE, type RenderBackend, type RenderInputs } from './render/backend.js';
export { selectRenderBackend, type BackendSelection } from './render/selector.js';
export {
  HttpAvatarApi,
  buildSubmission,
  mapRemoteStatus,
  type AvatarApi,
  type RemoteStatusReport,
  type RemoteSubmission,
  type SubmitPayload,
  type TimelineEntry,
} from './render/remote-api.js';
export { RemoteAvatarRenderer, advanceJob, type RemoteRendererOptions } from './render/remote.js';
export {
  LocalSlideshowRenderer,
  buildSlideshowFilter,
  escapeFilterValue,
  type LocalRendererOptions,
  type OverlayCue,
  type SlideshowFilterOptions,
} from './render/local.js';

// --- Orchestrator ---
export {
  PipelineOrchestrator,
  type Collaborators,
  type OrchestratorOptions,
  type RenderBackendFactory,
  type RunRequest,
} from './orchestrator.js';
export {
  createOrchestrator,
  defaultCollaborators,
  defaultBackends,
  type CreateOrchestratorOptions,
} from './presets.js';

// --- Providers ---
export * from './providers/index.js';

// --- Utilities ---
export { runCommand, runStrict, hasCommand, type CommandRunner, type CommandResult, type CommandOptions } from './utils/shell.js';
export { loadDotenv, parseDotenv } from './utils/env.js';
export { systemClock, sleep, type Clock } from './utils/time.js';
export { ensureDir, newRunId, writeFileAtomic, writeJsonAtomic, readJsonSafe, fileSize } from './utils/fs.js';
export { fetchJson, fetchOrThrow, ensureOk, isTransientStatus } from './utils/http.js';
