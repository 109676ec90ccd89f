/**
 * @module providers/llm
 * Chat-completions client shared by OpenAI and OpenRouter.
 */

import { z } from 'zod';
import type { PipelineContext } from '../context.js';
import type { LLMConfig } from '../config.js';
import { UpstreamAPIError } from '../errors.js';
import { fetchJson } from '../utils/http.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface ChatReply {
  text: string;
  model: string;
  /** True when the model stopped at the token limit. */
  truncated: boolean;
}

export interface ChatProvider {
  readonly name: string;
  complete(req: ChatRequest, ctx: PipelineContext): Promise<ChatReply>;
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
});

interface Endpoint {
  baseUrl: string;
  headers?: Record<string, string>;
}

const ENDPOINTS: Record<LLMConfig['provider'], Endpoint> = {
  openai: { baseUrl: 'https://api.openai.com/v1' },
  openrouter: { baseUrl: 'https://openrouter.ai/api/v1', headers: { 'X-Title': 'article2video' } },
};

export class ChatCompletionsProvider implements ChatProvider {
  readonly name: string;
  private readonly endpoint: Endpoint;

  constructor(
    private readonly config: LLMConfig,
    endpoint?: Endpoint,
  ) {
    this.name = config.provider;
    this.endpoint = endpoint ?? ENDPOINTS[config.provider];
  }

  async complete(req: ChatRequest, ctx: PipelineContext): Promise<ChatReply> {
    ctx.logger.debug(`Chat completion via ${this.name} (${this.config.model}, ${req.messages.length} messages)`);

    const raw = await fetchJson(`LLM ${this.name}`, `${this.endpoint.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${this.config.apiKey}`,
        ...this.endpoint.headers,
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: req.messages,
        temperature: req.temperature ?? this.config.temperature,
        max_tokens: req.maxTokens ?? this.config.maxTokens,
      }),
      signal: ctx.signal,
    });

    const parsed = ChatCompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamAPIError(`LLM ${this.name} returned an unexpected payload`, undefined, parsed.error);
    }
    const choice = parsed.data.choices[0];
    const text = choice?.message.content?.trim() ?? '';
    if (!text) {
      throw new UpstreamAPIError(`LLM ${this.name} returned an empty reply`);
    }
    return {
      text,
      model: parsed.data.model ?? this.config.model,
      truncated: choice?.finish_reason === 'length',
    };
  }
}

export function createChatProvider(config: LLMConfig): ChatProvider {
  return new ChatCompletionsProvider(config);
}
