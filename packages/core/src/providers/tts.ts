/**
 * @module providers/tts
 * Speech synthesis for one dialogue line at a time.
 *
 * Neighbouring lines travel with each request so the voice keeps its
 * intonation across clips that are later concatenated.
 */

import type { PipelineContext } from '../context.js';
import type { TTSConfig } from '../config.js';
import { UpstreamAPIError } from '../errors.js';
import { ensureOk, fetchOrThrow } from '../utils/http.js';

export interface SpeechRequest {
  text: string;
  voiceId: string;
  /** Line spoken just before, by either speaker. */
  previousText?: string;
  /** Line spoken just after. */
  nextText?: string;
}

export interface SpeechClip {
  /** Encoded audio, in the configured output format. */
  audio: Buffer;
  contentType: string;
}

export interface SpeechProvider {
  readonly name: string;
  synthesize(req: SpeechRequest, ctx: PipelineContext): Promise<SpeechClip>;
}

const ELEVENLABS_URL = 'https://api.elevenlabs.io/v1/text-to-speech';

/** JSON body of an ElevenLabs text-to-speech call. */
export function elevenLabsBody(req: SpeechRequest, config: TTSConfig): Record<string, unknown> {
  const body: Record<string, unknown> = {
    text: req.text,
    model_id: config.model,
    voice_settings: { stability: config.stability, similarity_boost: config.similarity },
  };
  if (req.previousText) body.previous_text = req.previousText;
  if (req.nextText) body.next_text = req.nextText;
  return body;
}

export class ElevenLabsProvider implements SpeechProvider {
  readonly name = 'elevenlabs';

  constructor(private readonly config: TTSConfig) { }

  async synthesize(req: SpeechRequest, ctx: PipelineContext): Promise<SpeechClip> {
    const url =
      `${ELEVENLABS_URL}/${encodeURIComponent(req.voiceId)}` +
      `?output_format=${encodeURIComponent(this.config.outputFormat)}`;
    ctx.logger.debug(`Speech for voice ${req.voiceId}: ${req.text.slice(0, 60)}`);

    const res = await ensureOk(
      'ElevenLabs',
      await fetchOrThrow('ElevenLabs', url, {
        method: 'POST',
        headers: { 'xi-api-key': this.config.apiKey, 'content-type': 'application/json' },
        body: JSON.stringify(elevenLabsBody(req, this.config)),
        signal: ctx.signal,
      }),
    );

    const audio = Buffer.from(await res.arrayBuffer());
    if (audio.length === 0) {
      throw new UpstreamAPIError('ElevenLabs returned an empty audio clip', res.status);
    }
    return { audio, contentType: res.headers.get('content-type') ?? 'audio/mpeg' };
  }
}

export function createSpeechProvider(config: TTSConfig): SpeechProvider {
  switch (config.provider) {
    case 'elevenlabs':
      return new ElevenLabsProvider(config);
  }
}
