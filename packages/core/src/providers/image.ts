/**
 * @module providers/image
 * Image generation provider abstraction.
 */

import { z } from 'zod';
import type { PipelineContext } from '../context.js';
import type { ImageConfig } from '../config.js';
import { UpstreamAPIError } from '../errors.js';
import { fetchJson } from '../utils/http.js';

export interface ImageRequest {
  prompt: string;
  /** "WIDTHxHEIGHT" as accepted by the model. */
  size?: string;
}

export interface ImageResponse {
  /** PNG bytes. */
  image: Buffer;
  /** Prompt after the model's own rewriting, when reported. */
  revisedPrompt?: string;
}

export interface ImageProvider {
  readonly name: string;
  generate(req: ImageRequest, ctx: PipelineContext): Promise<ImageResponse>;
}

const ImageResultSchema = z.object({
  data: z
    .array(z.object({ b64_json: z.string().optional(), revised_prompt: z.string().optional() }))
    .min(1),
});

export class OpenAIImageProvider implements ImageProvider {
  readonly name = 'openai-image';
  private readonly baseUrl: string;

  constructor(
    private readonly config: ImageConfig,
    opts?: { baseUrl?: string },
  ) {
    this.baseUrl = (opts?.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
  }

  async generate(req: ImageRequest, ctx: PipelineContext): Promise<ImageResponse> {
    ctx.logger.debug(`Image request (${this.config.model}): ${req.prompt.slice(0, 60)}…`);

    const raw = await fetchJson(`Image ${this.name}`, `${this.baseUrl}/images/generations`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        prompt: req.prompt,
        size: req.size ?? this.config.size,
        n: 1,
        response_format: 'b64_json',
      }),
      signal: ctx.signal,
    });

    const parsed = ImageResultSchema.safeParse(raw);
    const first = parsed.success ? parsed.data.data[0] : undefined;
    if (!first?.b64_json) {
      throw new UpstreamAPIError(`Image ${this.name} returned no image data`);
    }
    const image = Buffer.from(first.b64_json, 'base64');
    if (image.length === 0) {
      throw new UpstreamAPIError(`Image ${this.name} returned an empty image`);
    }
    return { image, revisedPrompt: first.revised_prompt };
  }
}

export function createImageProvider(config: ImageConfig): ImageProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAIImageProvider(config);
  }
}
