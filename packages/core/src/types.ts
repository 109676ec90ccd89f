/**
 * @module types
 * Domain model shared by the orchestrator, the collaborators and the render
 * backends. Every value here is plain data so it can be cached as JSON.
 */

// ---------------------------------------------------------------------------
// Source material
// ---------------------------------------------------------------------------

export interface Article {
  id: number;
  title: string;
  /** Markdown body as published. */
  body: string;
  /** ISO timestamp. */
  publishedAt?: string;
  url?: string;
  tags: string[];
}

export type Speaker = 'A' | 'B';

export interface ScriptLine {
  speaker: Speaker;
  text: string;
}

export interface Script {
  articleId: number;
  lines: ScriptLine[];
  /** Model output the lines were parsed from. */
  rawText: string;
}

// ---------------------------------------------------------------------------
// Narration
// ---------------------------------------------------------------------------

/** Offsets of one script line inside the mixed audio track, in seconds. */
export interface LineTiming {
  index: number;
  speaker: Speaker;
  text: string;
  start: number;
  end: number;
}

export interface AudioTrack {
  articleId: number;
  /** Absolute path to the mixed track. */
  path: string;
  durationSec: number;
  /** One entry per script line, monotonic and non-overlapping. */
  lines: LineTiming[];
}

export interface Cue {
  text: string;
  start: number;
  end: number;
}

export interface SubtitleSet {
  articleId: number;
  /** Absolute path to the SRT rendition. */
  path: string;
  cues: Cue[];
}

export interface BackgroundImage {
  articleId: number;
  path: string;
  prompt: string;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export type RenderJobStatus = 'queued' | 'processing' | 'ready' | 'failed' | 'timed_out';

export interface RenderJob {
  id: string;
  status: RenderJobStatus;
  backend: 'remote';
  /** ISO timestamp of the submission. */
  createdAt: string;
  downloadUrl?: string;
  /** Diagnostic returned by the last status check. */
  message?: string;
}

export type RenderBackendKind = 'remote' | 'local';

export interface VideoArtifact {
  articleId: number;
  path: string;
  origin: RenderBackendKind;
  durationSec?: number;
  bytes: number;
  jobId?: string;
}

// ---------------------------------------------------------------------------
// Publishing
// ---------------------------------------------------------------------------

export type PrivacyStatus = 'public' | 'unlisted' | 'private';

export interface VideoMetadata {
  articleId: number;
  title: string;
  description: string;
  tags: string[];
  /** YouTube category id, e.g. "28" (Science & Technology). */
  categoryId: string;
  privacyStatus: PrivacyStatus;
  language: string;
}

export interface PublishRecord {
  articleId: number;
  url: string;
  publishedAt: string;
}

// ---------------------------------------------------------------------------
// Pipeline run
// ---------------------------------------------------------------------------

export type StageName =
  | 'fetch'
  | 'script'
  | 'audio'
  | 'subtitles'
  | 'background'
  | 'render'
  | 'publish';

export const STAGE_ORDER: readonly StageName[] = [
  'fetch',
  'script',
  'audio',
  'subtitles',
  'background',
  'render',
  'publish',
];

export type RunPhase =
  | 'fetching'
  | 'scripting'
  | 'narrating'
  | 'illustrating'
  | 'rendering'
  | 'publishing'
  | 'done';

export type StageStatus = 'pending' | 'running' | 'completed' | 'cached' | 'skipped' | 'failed';

export interface StageRecord {
  stage: StageName;
  status: StageStatus;
  attempts: number;
  startedAt?: string;
  finishedAt?: string;
}

export type RunStatus = 'running' | 'completed' | 'failed' | 'skipped_publish';

export interface RunError {
  stage: StageName;
  /** Stable machine-readable code, e.g. "REMOTE_RENDER_TIMEOUT". */
  code: string;
  name: string;
  message: string;
  at: string;
  jobId?: string;
  diagnostic?: string;
}

export interface PipelineRun {
  runId: string;
  requestedArticleId?: number;
  articleId?: number;
  backend?: RenderBackendKind;
  status: RunStatus;
  phase: RunPhase;
  currentStage?: StageName;
  stages: StageRecord[];
  error?: RunError;
  publishError?: RunError;
  video?: VideoArtifact;
  publishedUrl?: string;
  startedAt: string;
  finishedAt?: string;
}
