/**
 * @module render/remote-api
 * Wire contract of the remote avatar-rendering service.
 *
 *   submit   POST {baseUrl}{submitPath}            multipart: audio + payload JSON → { id }
 *   status   GET  {baseUrl}{statusPath}/{id}       → { status, download_url | url, error | message }
 *   cancel   POST {baseUrl}{statusPath}/{id}/cancel
 *   download GET  <download url>
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { OutputConfig, RemoteRenderConfig } from '../config.js';
import type { AudioTrack, RenderJobStatus, Speaker } from '../types.js';
import { UpstreamAPIError } from '../errors.js';
import { ensureOk, fetchJson, fetchOrThrow } from '../utils/http.js';

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export interface TimelineEntry {
  index: number;
  speaker: Speaker;
  character: string;
  start: number;
  end: number;
  text: string;
}

export interface SubmitPayload {
  characters: { a: string; b: string };
  timeline: TimelineEntry[];
  scene?: { id: string; width: number; height: number };
}

export interface RemoteSubmission {
  audioPath: string;
  payload: SubmitPayload;
}

/** A status report as the remote side states it; `timed_out` is only ever local. */
export interface RemoteStatusReport {
  status: Exclude<RenderJobStatus, 'timed_out'>;
  downloadUrl?: string;
  message?: string;
}

export interface AvatarApi {
  /** Returns the remote job id. */
  submit(submission: RemoteSubmission, signal: AbortSignal): Promise<string>;
  status(jobId: string, signal: AbortSignal): Promise<RemoteStatusReport>;
  download(url: string, signal: AbortSignal): Promise<Uint8Array>;
  cancel(jobId: string, signal: AbortSignal): Promise<void>;
}

export function buildSubmission(
  audio: AudioTrack,
  settings: RemoteRenderConfig,
  output: OutputConfig,
): RemoteSubmission {
  const character = (speaker: Speaker) =>
    speaker === 'A' ? settings.characterIdA : settings.characterIdB;

  const payload: SubmitPayload = {
    characters: { a: settings.characterIdA, b: settings.characterIdB },
    timeline: audio.lines.map((line) => ({
      index: line.index,
      speaker: line.speaker,
      character: character(line.speaker),
      start: line.start,
      end: line.end,
      text: line.text,
    })),
  };
  if (settings.sceneId) {
    payload.scene = { id: settings.sceneId, width: output.width, height: output.height };
  }
  return { audioPath: audio.path, payload };
}

// ---------------------------------------------------------------------------
// Status vocabulary
// ---------------------------------------------------------------------------

const STATUS_ALIASES: Record<string, RemoteStatusReport['status']> = {
  queued: 'queued',
  pending: 'queued',
  created: 'queued',
  processing: 'processing',
  running: 'processing',
  in_progress: 'processing',
  completed: 'ready',
  complete: 'ready',
  succeeded: 'ready',
  ready: 'ready',
  failed: 'failed',
  error: 'failed',
  cancelled: 'failed',
};

/** Case-insensitive mapping of a remote status string; unknown strings yield undefined. */
export function mapRemoteStatus(raw: string): RemoteStatusReport['status'] | undefined {
  return STATUS_ALIASES[raw.trim().toLowerCase()];
}

const SubmitResponseSchema = z.object({ id: z.union([z.string().min(1), z.number()]) });

const StatusResponseSchema = z.object({
  status: z.string().default('unknown'),
  download_url: z.string().nullish(),
  url: z.string().nullish(),
  error: z.string().nullish(),
  message: z.string().nullish(),
});

// ---------------------------------------------------------------------------
// HTTP implementation
// ---------------------------------------------------------------------------

export class HttpAvatarApi implements AvatarApi {
  private readonly baseUrl: string;

  constructor(private readonly settings: RemoteRenderConfig) {
    this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
  }

  async submit(submission: RemoteSubmission, signal: AbortSignal): Promise<string> {
    const audio = await fs.readFile(submission.audioPath);
    const form = new FormData();
    form.append(
      'audio',
      new Blob([new Uint8Array(audio)], { type: 'audio/mpeg' }),
      path.basename(submission.audioPath),
    );
    form.append('payload', JSON.stringify(submission.payload));

    const raw = await fetchJson('Avatar submit', `${this.baseUrl}${this.path(this.settings.submitPath)}`, {
      method: 'POST',
      headers: this.authHeaders(),
      body: form,
      signal,
    });
    const parsed = SubmitResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamAPIError('Avatar submit response did not include a job id');
    }
    return String(parsed.data.id);
  }

  async status(jobId: string, signal: AbortSignal): Promise<RemoteStatusReport> {
    const raw = await fetchJson('Avatar status', this.jobUrl(jobId), {
      headers: this.authHeaders(),
      signal,
    });
    const parsed = StatusResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamAPIError(`Avatar status for ${jobId} has an unexpected shape`);
    }
    const body = parsed.data;
    const downloadUrl = body.download_url || body.url || undefined;
    const message = body.error || body.message || undefined;
    // An unknown status string never advances the job.
    let status = mapRemoteStatus(body.status) ?? 'queued';
    // Ready without a download reference is still in progress.
    if (status === 'ready' && !downloadUrl) status = 'processing';
    return { status, downloadUrl, message };
  }

  async download(url: string, signal: AbortSignal): Promise<Uint8Array> {
    const res = await ensureOk(
      'Avatar download',
      await fetchOrThrow('Avatar download', url, { headers: this.authHeaders(), signal }),
    );
    return new Uint8Array(await res.arrayBuffer());
  }

  async cancel(jobId: string, signal: AbortSignal): Promise<void> {
    await ensureOk(
      'Avatar cancel',
      await fetchOrThrow('Avatar cancel', `${this.jobUrl(jobId)}/cancel`, {
        method: 'POST',
        headers: this.authHeaders(),
        signal,
      }),
    );
  }

  private jobUrl(jobId: string): string {
    return `${this.baseUrl}${this.path(this.settings.statusPath)}/${encodeURIComponent(jobId)}`;
  }

  private path(p: string): string {
    const trimmed = p.replace(/\/+$/, '');
    return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  }

  private authHeaders(): Record<string, string> {
    return {
      authorization: `Bearer ${this.settings.apiKey}`,
      'x-api-key': this.settings.apiKey,
    };
  }
}
