/**
 * @module providers/asr
 * Speech recognition with segment timestamps, used to align subtitles to the
 * narration actually produced.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { PipelineContext } from '../context.js';
import type { ASRConfig } from '../config.js';
import { UpstreamAPIError } from '../errors.js';
import { fetchJson } from '../utils/http.js';

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface Transcript {
  text: string;
  segments: TranscriptSegment[];
  durationSec?: number;
}

export interface TranscriptionProvider {
  readonly name: string;
  transcribe(audioPath: string, lang: string, ctx: PipelineContext): Promise<Transcript>;
}

const VerboseTranscriptSchema = z.object({
  text: z.string().default(''),
  duration: z.number().optional(),
  segments: z.array(z.object({ start: z.number(), end: z.number(), text: z.string() })).default([]),
});

/** OpenAI `audio/transcriptions` in `verbose_json` mode. */
export class WhisperTranscriptionProvider implements TranscriptionProvider {
  readonly name = 'openai-whisper';
  private readonly baseUrl: string;

  constructor(
    private readonly config: ASRConfig,
    baseUrl = 'https://api.openai.com/v1',
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async transcribe(audioPath: string, lang: string, ctx: PipelineContext): Promise<Transcript> {
    const audio = await fs.readFile(audioPath);
    const name = path.basename(audioPath);
    ctx.logger.debug(`Transcribing ${name} (${audio.length} bytes, ${lang})`);

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)], { type: 'audio/mpeg' }), name);
    form.append('model', this.config.model);
    form.append('language', lang);
    form.append('response_format', 'verbose_json');
    form.append('timestamp_granularities[]', 'segment');

    const raw = await fetchJson('Whisper', `${this.baseUrl}/audio/transcriptions`, {
      method: 'POST',
      headers: { authorization: `Bearer ${this.config.apiKey}` },
      body: form,
      signal: ctx.signal,
    });

    const parsed = VerboseTranscriptSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamAPIError('Whisper returned an unexpected payload', undefined, parsed.error);
    }
    return {
      text: parsed.data.text.trim(),
      segments: parsed.data.segments,
      durationSec: parsed.data.duration,
    };
  }
}

export function createTranscriptionProvider(config: ASRConfig): TranscriptionProvider {
  switch (config.provider) {
    case 'openai':
      return new WhisperTranscriptionProvider(config);
  }
}
