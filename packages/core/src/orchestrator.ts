/**
 * @module orchestrator
 * Drives one article through fetch → script → (audio → subtitles ∥ background)
 * → render → publish, recording every step on a {@link PipelineRun}.
 *
 * - Each expensive stage consults the per-article artifact cache first, so a
 *   re-run resumes at the stage that failed.
 * - The render backend is chosen before any collaborator is called.
 * - Only transient upstream errors are retried; render never is.
 * - Failures end the run as `failed` and are returned, not thrown. The one
 *   exception is {@link RunInProgressError}: no run is recorded for it.
 * - A publish failure degrades the run to `skipped_publish`.
 */

import type { PipelineConfig, RemoteRenderConfig } from './config.js';
import type {
  ArticleSource,
  AudioSynthesizer,
  BackgroundArtist,
  MetadataGenerator,
  Notifier,
  Publisher,
  ScriptGenerator,
  SubtitleAligner,
} from './collaborators.js';
import { ConsoleLogger, type Logger, type PipelineContext, type StageContext } from './context.js';
import { PipelineEmitter, type PipelineEventMap } from './events.js';
import {
  RemoteRenderError,
  RunCancelledError,
  RunInProgressError,
  errorCode,
  toError,
} from './errors.js';
import { RunLock, type ReleaseFn } from './lock.js';
import { executeWithRetry, NO_RETRY, type RetryPolicy } from './stage.js';
import type { ArtifactKind, ArtifactRecords, ArtifactStore } from './store.js';
import {
  STAGE_ORDER,
  type Article,
  type PipelineRun,
  type RunError,
  type Script,
  type StageName,
  type StageRecord,
  type VideoMetadata,
} from './types.js';
import type { RenderBackend } from './render/backend.js';
import { selectRenderBackend } from './render/selector.js';
import { TemplateMetadataGenerator, metadataDefaults } from './stages/publish/metadata.js';
import { newRunId } from './utils/fs.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Collaborators {
  source: ArticleSource;
  scripts: ScriptGenerator;
  narrator: AudioSynthesizer;
  aligner: SubtitleAligner;
  artist: BackgroundArtist;
  /** Absent when upload credentials are not configured. */
  publisher?: Publisher;
  /** Upload metadata; the article/script template when absent. */
  metadata?: MetadataGenerator;
  notifier?: Notifier;
}

/** Builds the backend the selector picked; only called after selection succeeded. */
export interface RenderBackendFactory {
  local(): RenderBackend;
  remote(settings: RemoteRenderConfig): RenderBackend;
}

export interface OrchestratorOptions {
  config: PipelineConfig;
  collaborators: Collaborators;
  backends: RenderBackendFactory;
  store: ArtifactStore;
  lock?: RunLock;
  logger?: Logger;
  emitter?: PipelineEmitter;
}

export interface RunRequest {
  /** Omit for the latest article. */
  articleId?: number;
  signal?: AbortSignal;
  runId?: string;
}

/** A stage error on its way to the run record. */
class StageFailed extends Error {
  constructor(
    readonly stage: StageName,
    readonly error: Error,
  ) {
    super(error.message);
    this.name = 'StageFailed';
  }
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class PipelineOrchestrator {
  readonly emitter: PipelineEmitter;
  readonly lock: RunLock;
  private readonly config: PipelineConfig;
  private readonly collaborators: Collaborators;
  private readonly backends: RenderBackendFactory;
  private readonly store: ArtifactStore;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly metadata: MetadataGenerator;

  constructor(opts: OrchestratorOptions) {
    this.config = opts.config;
    this.collaborators = opts.collaborators;
    this.backends = opts.backends;
    this.store = opts.store;
    this.lock = opts.lock ?? new RunLock();
    this.logger = opts.logger ?? new ConsoleLogger(opts.config.debug, 'pipeline');
    this.emitter = opts.emitter ?? new PipelineEmitter();
    this.retry = { maxAttempts: opts.config.retry.maxAttempts, backoffMs: opts.config.retry.backoffMs };
    this.metadata = opts.collaborators.metadata ?? new TemplateMetadataGenerator(metadataDefaults(opts.config));
  }

  /** Subscribe to pipeline events. Returns `this` for chaining. */
  on<K extends keyof PipelineEventMap>(event: K, listener: (payload: PipelineEventMap[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  async run(req: RunRequest = {}): Promise<PipelineRun> {
    const signal = req.signal ?? new AbortController().signal;
    const run: PipelineRun = {
      runId: req.runId ?? newRunId(),
      requestedArticleId: req.articleId,
      status: 'running',
      phase: 'fetching',
      stages: STAGE_ORDER.map((stage): StageRecord => ({ stage, status: 'pending', attempts: 0 })),
      startedAt: new Date().toISOString(),
    };
    const ctx: PipelineContext = {
      config: this.config,
      emitter: this.emitter,
      runId: run.runId,
      signal,
      logger: this.logger,
    };

    let release: ReleaseFn | undefined =
      req.articleId !== undefined ? this.lock.acquire(req.articleId) : undefined;

    try {
      this.emitter.emit('run:start', { runId: run.runId, requestedArticleId: req.articleId });
      this.logger.info(
        `Run ${run.runId} started for ${req.articleId !== undefined ? `article ${req.articleId}` : 'the latest article'}`,
      );

      try {
        await this.execute(run, ctx, req, (articleId) => {
          release ??= this.lock.acquire(articleId);
        });
      } catch (err) {
        if (err instanceof RunInProgressError) throw err;
        const failure =
          err instanceof StageFailed ? err : new StageFailed(run.currentStage ?? 'fetch', toError(err));
        this.fail(run, failure, signal);
      }

      return await this.finish(run, ctx);
    } finally {
      release?.();
    }
  }

  // -------------------------------------------------------------------------
  // Flow
  // -------------------------------------------------------------------------

  private async execute(
    run: PipelineRun,
    base: PipelineContext,
    req: RunRequest,
    claim: (articleId: number) => void,
  ): Promise<void> {
    const { source, scripts, narrator, aligner, artist, publisher } = this.collaborators;

    let backend: RenderBackend;
    try {
      const selection = selectRenderBackend(this.config.remote);
      backend =
        selection.kind === 'remote' ? this.backends.remote(selection.settings) : this.backends.local();
      run.backend = selection.kind;
    } catch (err) {
      throw new StageFailed('render', toError(err));
    }

    // Fetching
    const article = await this.stage(run, 'fetch', base, () => source.fetch(req.articleId, base));
    claim(article.id);
    run.articleId = article.id;

    const ctx: StageContext = {
      ...base,
      articleId: article.id,
      artifactDir: this.store.dirFor(article.id),
    };

    // Scripting
    run.phase = 'scripting';
    const script = await this.cached(run, 'script', 'script', ctx, () => scripts.generate(article, ctx));

    // Narrating ∥ Illustrating: the background is generated alongside the
    // narration; once the narration is done the run waits in `illustrating`.
    run.phase = 'narrating';
    const narration = (async () => {
      const audio = await this.cached(run, 'audio', 'audio', ctx, () => narrator.synthesize(script, ctx));
      const subtitles = await this.cached(run, 'subtitles', 'subtitles', ctx, () =>
        aligner.align(audio, script, ctx),
      );
      run.phase = 'illustrating';
      return { audio, subtitles };
    })();
    const illustration = this.cached(run, 'background', 'background', ctx, () => artist.generate(article, ctx));

    const [narrated, illustrated] = await Promise.allSettled([narration, illustration]);
    if (narrated.status === 'rejected') throw narrated.reason;
    if (illustrated.status === 'rejected') throw illustrated.reason;
    const { audio, subtitles } = narrated.value;
    const background = illustrated.value;

    // Rendering
    run.phase = 'rendering';
    const video = await this.cached(
      run,
      'render',
      'video',
      ctx,
      () => backend.render({ article, script, audio, subtitles, background }, ctx),
      NO_RETRY,
    );
    run.video = video;

    // Publishing
    run.phase = 'publishing';
    if (!publisher) {
      this.skip(run, 'publish', 'not-configured');
      run.status = 'skipped_publish';
      return;
    }
    try {
      const record = await this.cached(run, 'publish', 'publish', ctx, async () => {
        const metadata = await this.uploadMetadata(article, script, ctx);
        return {
          articleId: article.id,
          url: await publisher.publish(video, metadata, ctx),
          publishedAt: new Date().toISOString(),
        };
      });
      run.publishedUrl = record.url;
      run.status = 'completed';
    } catch (err) {
      if (base.signal.aborted || !(err instanceof StageFailed)) throw err;
      this.logger.warn(`Publishing failed, keeping the rendered video: ${err.error.message}`);
      run.status = 'skipped_publish';
      run.publishError = this.toRunError('publish', err.error);
    }
  }

  /** Metadata stored on first success, so a retried or resumed upload reuses it. */
  private async uploadMetadata(article: Article, script: Script, ctx: StageContext): Promise<VideoMetadata> {
    const cache = this.store.cache('metadata');
    const key = String(ctx.articleId);
    const stored = await cache.get(key);
    if (stored !== undefined) return stored;
    const metadata = await this.metadata.generate(article, script, ctx);
    await cache.put(key, metadata);
    this.logger.info(`Upload metadata ready: ${metadata.title}`);
    return metadata;
  }

  // -------------------------------------------------------------------------
  // Stage helpers
  // -------------------------------------------------------------------------

  /** Cache lookup, then the stage; the result is stored only once the stage succeeded. */
  private async cached<K extends ArtifactKind>(
    run: PipelineRun,
    name: StageName,
    kind: K,
    ctx: StageContext,
    produce: () => Promise<ArtifactRecords[K]>,
    policy: RetryPolicy = this.retry,
  ): Promise<ArtifactRecords[K]> {
    this.checkAborted(name, ctx.signal);
    const cache = this.store.cache(kind);
    const key = String(ctx.articleId);

    const hit = await cache.get(key);
    if (hit !== undefined) {
      this.skip(run, name, 'cache-hit');
      return hit;
    }
    return this.stage(run, name, ctx, produce, policy, (value) => cache.put(key, value));
  }

  private async stage<T>(
    run: PipelineRun,
    name: StageName,
    ctx: PipelineContext,
    fn: () => Promise<T>,
    policy: RetryPolicy = this.retry,
    commit?: (value: T) => Promise<void>,
  ): Promise<T> {
    this.checkAborted(name, ctx.signal);
    const record = this.record(run, name);
    record.status = 'running';
    record.startedAt = new Date().toISOString();
    run.currentStage = name;
    const t0 = performance.now();

    try {
      const value = await executeWithRetry(fn, policy, ctx.signal, {
        onAttempt: (attempt) => {
          record.attempts = attempt;
          this.emitter.emit('stage:start', { runId: run.runId, stage: name, attempt });
          this.logger.debug(`Stage ${name} attempt ${attempt}`);
        },
        onError: (error, willRetry) => {
          this.emitter.emit('stage:error', { runId: run.runId, stage: name, error, willRetry });
          if (willRetry) this.logger.warn(`Stage ${name} failed transiently, retrying: ${error.message}`);
        },
      });
      await commit?.(value);

      record.status = 'completed';
      record.finishedAt = new Date().toISOString();
      const durationMs = Math.round(performance.now() - t0);
      this.emitter.emit('stage:complete', { runId: run.runId, stage: name, durationMs });
      this.logger.info(`Stage ${name} completed in ${durationMs}ms`);
      return value;
    } catch (err) {
      record.status = 'failed';
      record.finishedAt = new Date().toISOString();
      throw new StageFailed(name, toError(err));
    }
  }

  private skip(run: PipelineRun, name: StageName, reason: 'cache-hit' | 'not-configured'): void {
    const record = this.record(run, name);
    record.status = reason === 'cache-hit' ? 'cached' : 'skipped';
    record.finishedAt = new Date().toISOString();
    this.emitter.emit('stage:skip', { runId: run.runId, stage: name, reason });
    this.logger.info(`Stage ${name} skipped (${reason})`);
  }

  private checkAborted(name: StageName, signal: AbortSignal): void {
    if (signal.aborted) throw new StageFailed(name, new RunCancelledError());
  }

  private record(run: PipelineRun, name: StageName): StageRecord {
    const found = run.stages.find((s) => s.stage === name);
    if (found) return found;
    const created: StageRecord = { stage: name, status: 'pending', attempts: 0 };
    run.stages.push(created);
    return created;
  }

  // -------------------------------------------------------------------------
  // Outcome
  // -------------------------------------------------------------------------

  private fail(run: PipelineRun, failure: StageFailed, signal: AbortSignal): void {
    const error =
      signal.aborted && !(failure.error instanceof RunCancelledError)
        ? new RunCancelledError('Pipeline run cancelled', failure.error)
        : failure.error;
    const record = this.record(run, failure.stage);
    if (record.status !== 'failed') {
      record.status = 'failed';
      record.finishedAt = new Date().toISOString();
    }
    run.status = 'failed';
    run.currentStage = failure.stage;
    run.error = this.toRunError(failure.stage, error);
    this.logger.error(`Run ${run.runId} failed at ${failure.stage}: [${run.error.code}] ${error.message}`);
  }

  private toRunError(stage: StageName, error: Error): RunError {
    const out: RunError = {
      stage,
      code: errorCode(error),
      name: error.name,
      message: error.message,
      at: new Date().toISOString(),
    };
    if (error instanceof RemoteRenderError) {
      if (error.jobId) out.jobId = error.jobId;
      if (error.diagnostic) out.diagnostic = error.diagnostic;
    }
    return out;
  }

  private async finish(run: PipelineRun, ctx: PipelineContext): Promise<PipelineRun> {
    if (run.status !== 'failed') {
      run.phase = 'done';
      run.currentStage = undefined;
    }
    run.finishedAt = new Date().toISOString();

    if (run.articleId !== undefined) {
      try {
        await this.store.saveRun(run);
      } catch (err) {
        this.logger.warn(`Could not write run summary: ${toError(err).message}`);
      }
    }

    this.emitter.emit('run:complete', { run });
    this.logger.info(`Run ${run.runId} finished: ${run.status}`);

    if (this.collaborators.notifier) {
      try {
        await this.collaborators.notifier.notify(run, ctx);
      } catch (err) {
        this.logger.warn(`Notification failed: ${toError(err).message}`);
      }
    }
    return run;
  }
}
