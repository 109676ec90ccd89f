/**
 * @module render/remote
 * Remote avatar renderer: submit a job, drive it through
 * queued → processing → ready | failed | timed_out, download the result.
 *
 * The poll loop owns its deadline (`pollTimeoutSec` after submission) and a
 * hard cap of ⌈timeout / interval⌉ status calls, so it always terminates.
 * Every wait goes through the injected {@link Clock} and the run's signal.
 */

import path from 'node:path';
import type { StageContext } from '../context.js';
import type { OutputConfig, RemoteRenderConfig } from '../config.js';
import type { RenderJob, RenderJobStatus, VideoArtifact } from '../types.js';
import {
  RemoteRenderError,
  RemoteRenderFailedError,
  RemoteRenderTimeoutError,
  TransientAPIError,
  toError,
} from '../errors.js';
import { systemClock, type Clock } from '../utils/time.js';
import { writeFileAtomic } from '../utils/fs.js';
import { VIDEO_FILE, type RenderBackend, type RenderInputs } from './backend.js';
import { buildSubmission, type AvatarApi, type RemoteStatusReport } from './remote-api.js';

const STATUS_RANK: Record<RenderJobStatus, number> = {
  queued: 0,
  processing: 1,
  ready: 2,
  failed: 2,
  timed_out: 2,
};

function isTerminal(status: RenderJobStatus): boolean {
  return STATUS_RANK[status] === 2;
}

/** Apply a status report; reports that would move the job backwards are ignored. */
export function advanceJob(job: RenderJob, report: RemoteStatusReport): RenderJob {
  if (isTerminal(job.status) || STATUS_RANK[report.status] < STATUS_RANK[job.status]) {
    return job;
  }
  return {
    ...job,
    status: report.status,
    downloadUrl: report.downloadUrl ?? job.downloadUrl,
    message: report.message ?? job.message,
  };
}

export interface RemoteRendererOptions {
  output: OutputConfig;
  clock?: Clock;
}

export class RemoteAvatarRenderer implements RenderBackend {
  readonly kind = 'remote' as const;
  private readonly clock: Clock;
  private readonly output: OutputConfig;
  /** Clock reading at submission, per job id. */
  private readonly submittedAt = new Map<string, number>();

  constructor(
    private readonly api: AvatarApi,
    private readonly settings: RemoteRenderConfig,
    opts: RemoteRendererOptions,
  ) {
    this.clock = opts.clock ?? systemClock;
    this.output = opts.output;
  }

  /** Upper bound on status calls for one job. */
  get maxPolls(): number {
    return Math.ceil(this.settings.pollTimeoutSec / this.settings.pollIntervalSec);
  }

  async render(inputs: RenderInputs, ctx: StageContext): Promise<VideoArtifact> {
    const job = await this.submit(inputs, ctx);
    try {
      const ready = await this.awaitCompletion(job, ctx);
      return await this.download(ready, inputs, ctx);
    } finally {
      this.submittedAt.delete(job.id);
    }
  }

  async submit(inputs: RenderInputs, ctx: StageContext): Promise<RenderJob> {
    const submission = buildSubmission(inputs.audio, this.settings, this.output);
    let id: string;
    try {
      id = await this.api.submit(submission, ctx.signal);
    } catch (err) {
      if (ctx.signal.aborted) throw err;
      throw new RemoteRenderError(`Remote render submission failed: ${toError(err).message}`, {
        cause: err,
      });
    }
    this.submittedAt.set(id, this.clock.now());
    ctx.logger.info(`Remote render job ${id} submitted (${submission.payload.timeline.length} lines)`);
    return { id, status: 'queued', backend: 'remote', createdAt: new Date().toISOString() };
  }

  /** One status call. */
  async poll(job: RenderJob, ctx: StageContext): Promise<RenderJob> {
    try {
      return advanceJob(job, await this.api.status(job.id, ctx.signal));
    } catch (err) {
      if (ctx.signal.aborted) throw err;
      if (err instanceof TransientAPIError) {
        ctx.logger.warn(`Status check for ${job.id} failed transiently: ${err.message}`);
        return job;
      }
      throw new RemoteRenderError(`Status check for ${job.id} failed: ${toError(err).message}`, {
        jobId: job.id,
        cause: err,
      });
    }
  }

  /** Resolves with the job in `ready`; throws on failure, timeout or abort. */
  async awaitCompletion(job: RenderJob, ctx: StageContext): Promise<RenderJob> {
    const intervalMs = this.settings.pollIntervalSec * 1000;
    const timeoutMs = this.settings.pollTimeoutSec * 1000;
    const deadline = (this.submittedAt.get(job.id) ?? this.clock.now()) + timeoutMs;
    const maxPolls = this.maxPolls;
    let current = job;
    let polls = 0;

    try {
      for (;;) {
        const remaining = deadline - this.clock.now();
        if (remaining <= 0 || polls >= maxPolls) {
          ctx.logger.warn(`Remote render job ${job.id} timed out after ${polls} polls`);
          await this.releaseJob(job.id, ctx, 'timeout');
          throw new RemoteRenderTimeoutError(
            { ...current, status: 'timed_out' },
            this.settings.pollTimeoutSec,
            polls,
          );
        }

        await this.clock.sleep(Math.min(intervalMs, remaining), ctx.signal);
        polls++;
        current = await this.poll(current, ctx);
        ctx.emitter.emit('render:poll', {
          runId: ctx.runId,
          jobId: job.id,
          poll: polls,
          maxPolls,
          status: current.status,
        });
        ctx.logger.debug(`Job ${job.id} poll ${polls}/${maxPolls}: ${current.status}`);

        if (current.status === 'ready') return current;
        if (current.status === 'failed') {
          throw new RemoteRenderFailedError(job.id, current.message);
        }
      }
    } catch (err) {
      if (ctx.signal.aborted) await this.releaseJob(job.id, ctx, 'cancellation');
      throw err;
    }
  }

  async download(job: RenderJob, inputs: RenderInputs, ctx: StageContext): Promise<VideoArtifact> {
    if (!job.downloadUrl) {
      throw new RemoteRenderError(`Remote render job ${job.id} is ready without a download URL`, {
        jobId: job.id,
      });
    }
    let bytes: Uint8Array;
    try {
      bytes = await this.api.download(job.downloadUrl, ctx.signal);
    } catch (err) {
      if (ctx.signal.aborted) throw err;
      throw new RemoteRenderError(`Download of job ${job.id} failed: ${toError(err).message}`, {
        jobId: job.id,
        cause: err,
      });
    }
    if (bytes.length === 0) {
      throw new RemoteRenderError(`Remote render job ${job.id} produced an empty download`, {
        jobId: job.id,
      });
    }

    const target = path.join(ctx.artifactDir, VIDEO_FILE);
    await writeFileAtomic(target, bytes);
    return {
      articleId: ctx.articleId,
      path: target,
      origin: 'remote',
      durationSec: inputs.audio.durationSec,
      bytes: bytes.length,
      jobId: job.id,
    };
  }

  /** Apply the cancel policy to a job the local side stopped waiting for. */
  private async releaseJob(jobId: string, ctx: StageContext, reason: string): Promise<void> {
    if (this.settings.cancelPolicy !== 'cancel') {
      ctx.logger.info(`Leaving remote job ${jobId} running after ${reason}`);
      return;
    }
    try {
      await this.api.cancel(jobId, AbortSignal.timeout(10_000));
      ctx.logger.info(`Requested cancellation of remote job ${jobId} after ${reason}`);
    } catch (err) {
      ctx.logger.warn(`Cancel request for ${jobId} failed: ${toError(err).message}`);
    }
  }
}
