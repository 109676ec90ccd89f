/**
 * @module errors
 * Error taxonomy for the pipeline.
 *
 * All error classes extend `PipelineFailure`, set `.name`, expose a stable
 * `code` and preserve cause chains. The orchestrator reads `code` when it
 * records a failed run, the HTTP layer when it picks a status code.
 */

import type { RenderJob } from './types.js';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export abstract class PipelineFailure extends Error {
  abstract readonly code: string;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * The remote render backend is partially configured (key present, character
 * ids missing). Fatal, never retried, raised before any network call.
 */
export class ConfigurationError extends PipelineFailure {
  readonly code = 'CONFIGURATION';
  /** Config paths that are missing or invalid. */
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.fields = fields;
  }
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export class NotFoundError extends PipelineFailure {
  readonly code = 'NOT_FOUND';
  readonly articleId?: number;

  constructor(message: string, articleId?: number) {
    super(message);
    this.name = 'NotFoundError';
    this.articleId = articleId;
  }
}

// ---------------------------------------------------------------------------
// Upstream APIs
// ---------------------------------------------------------------------------

/**
 * Rate limiting, a 5xx or a network failure from an upstream API.
 * The only error the stage runner retries.
 */
export class TransientAPIError extends PipelineFailure {
  readonly code = 'TRANSIENT_API';
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause);
    this.name = 'TransientAPIError';
    this.status = status;
  }
}

/** Non-retryable upstream failure (4xx other than 429, malformed payload). */
export class UpstreamAPIError extends PipelineFailure {
  readonly code = 'UPSTREAM_API';
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause);
    this.name = 'UpstreamAPIError';
    this.status = status;
  }
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export class RemoteRenderError extends PipelineFailure {
  readonly code: string = 'REMOTE_RENDER';
  readonly jobId?: string;
  /** Diagnostic returned by the remote status check, if any. */
  readonly diagnostic?: string;

  constructor(message: string, opts: { jobId?: string; diagnostic?: string; cause?: unknown } = {}) {
    super(message, opts.cause);
    this.name = 'RemoteRenderError';
    this.jobId = opts.jobId;
    this.diagnostic = opts.diagnostic;
  }
}

export class RemoteRenderFailedError extends RemoteRenderError {
  override readonly code = 'REMOTE_RENDER_FAILED';

  constructor(jobId: string, diagnostic?: string) {
    super(`Remote render job ${jobId} failed${diagnostic ? `: ${diagnostic}` : ''}`, {
      jobId,
      diagnostic,
    });
    this.name = 'RemoteRenderFailedError';
  }
}

export class RemoteRenderTimeoutError extends RemoteRenderError {
  override readonly code = 'REMOTE_RENDER_TIMEOUT';
  /** The job as last seen, moved to `timed_out`. */
  readonly job: RenderJob;
  readonly timeoutSec: number;
  readonly polls: number;

  constructor(job: RenderJob, timeoutSec: number, polls: number) {
    super(`Remote render job ${job.id} did not finish within ${timeoutSec}s (${polls} polls)`, {
      jobId: job.id,
      diagnostic: job.message,
    });
    this.name = 'RemoteRenderTimeoutError';
    this.job = job;
    this.timeoutSec = timeoutSec;
    this.polls = polls;
  }
}

export class LocalRenderError extends PipelineFailure {
  readonly code = 'LOCAL_RENDER';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'LocalRenderError';
  }
}

// ---------------------------------------------------------------------------
// Publishing
// ---------------------------------------------------------------------------

export class PublishError extends PipelineFailure {
  readonly code = 'PUBLISH';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'PublishError';
  }
}

// ---------------------------------------------------------------------------
// Run control
// ---------------------------------------------------------------------------

export class RunInProgressError extends PipelineFailure {
  readonly code = 'RUN_IN_PROGRESS';
  readonly articleId: number;

  constructor(articleId: number) {
    super(`A pipeline run for article ${articleId} is already in progress`);
    this.name = 'RunInProgressError';
    this.articleId = articleId;
  }
}

export class RunCancelledError extends PipelineFailure {
  readonly code = 'CANCELLED';

  constructor(message = 'Pipeline run cancelled', cause?: unknown) {
    super(message, cause);
    this.name = 'RunCancelledError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Stable code for any thrown value; plain errors map to "STAGE_FAILED". */
export function errorCode(err: unknown): string {
  return err instanceof PipelineFailure ? err.code : 'STAGE_FAILED';
}
