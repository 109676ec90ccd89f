/**
 * @module stages/publish/youtube
 * YouTube Data API upload: refresh an OAuth access token, open a resumable
 * upload session, send the file in one request.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import type { Publisher } from '../../collaborators.js';
import type { StageContext } from '../../context.js';
import type { PublishConfig } from '../../config.js';
import type { VideoArtifact, VideoMetadata } from '../../types.js';
import { PublishError, toError } from '../../errors.js';
import { ensureOk, fetchOrThrow } from '../../utils/http.js';

type YouTubeConfig = PublishConfig['youtube'];

const TOKEN_URL = 'https://oauth2.googleapis.com/token';
const UPLOAD_URL = 'https://www.googleapis.com/upload/youtube/v3/videos?uploadType=resumable&part=snippet,status';

const TokenSchema = z.object({ access_token: z.string().min(1) });
const VideoSchema = z.object({ id: z.string().min(1) });

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}

export class YouTubePublisher implements Publisher {
  constructor(private readonly config: YouTubeConfig) { }

  async publish(video: VideoArtifact, metadata: VideoMetadata, ctx: StageContext): Promise<string> {
    try {
      const token = await this.accessToken(ctx.signal);
      const session = await this.openSession(token, video, metadata, ctx.signal);
      const id = await this.upload(session, token, video, ctx.signal);
      ctx.logger.info(`Uploaded video ${id} (${video.bytes} bytes)`);
      return watchUrl(id);
    } catch (err) {
      if (ctx.signal.aborted || err instanceof PublishError) throw err;
      throw new PublishError(`YouTube upload failed: ${toError(err).message}`, err);
    }
  }

  private async accessToken(signal: AbortSignal): Promise<string> {
    const res = await fetchOrThrow('YouTube token', TOKEN_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        refresh_token: this.config.refreshToken,
        grant_type: 'refresh_token',
      }).toString(),
      signal,
    });
    const parsed = TokenSchema.safeParse(await (await ensureOk('YouTube token', res)).json());
    if (!parsed.success) throw new PublishError('OAuth token response has no access_token');
    return parsed.data.access_token;
  }

  private async openSession(
    token: string,
    video: VideoArtifact,
    metadata: VideoMetadata,
    signal: AbortSignal,
  ): Promise<string> {
    const res = await fetchOrThrow('YouTube session', UPLOAD_URL, {
      method: 'POST',
      headers: {
        authorization: `Bearer ${token}`,
        'content-type': 'application/json; charset=UTF-8',
        'x-upload-content-type': 'video/mp4',
        'x-upload-content-length': String(video.bytes),
      },
      body: JSON.stringify({
        snippet: {
          title: metadata.title,
          description: metadata.description,
          tags: metadata.tags,
          categoryId: metadata.categoryId,
          defaultLanguage: metadata.language,
        },
        status: { privacyStatus: metadata.privacyStatus, selfDeclaredMadeForKids: false },
      }),
      signal,
    });
    await ensureOk('YouTube session', res);
    const location = res.headers.get('location');
    if (!location) throw new PublishError('Upload session response has no Location header');
    return location;
  }

  private async upload(
    session: string,
    token: string,
    video: VideoArtifact,
    signal: AbortSignal,
  ): Promise<string> {
    const bytes = await fs.readFile(video.path);
    const res = await fetchOrThrow('YouTube upload', session, {
      method: 'PUT',
      headers: { authorization: `Bearer ${token}`, 'content-type': 'video/mp4' },
      body: new Uint8Array(bytes),
      signal,
    });
    const parsed = VideoSchema.safeParse(await (await ensureOk('YouTube upload', res)).json());
    if (!parsed.success) throw new PublishError('Upload response has no video id');
    return parsed.data.id;
  }
}
