/**
 * @module stages/publish/metadata
 * Upload metadata for the finished video.
 *
 * {@link LLMMetadataGenerator} asks the configured model for a title,
 * description, tags and category as JSON. A reply that is not usable JSON, or
 * an upstream error that retrying cannot fix, falls back to
 * {@link buildVideoMetadata}, which derives everything from the article and
 * script. Privacy always comes from configuration.
 */

import { z } from 'zod';
import type { MetadataGenerator } from '../../collaborators.js';
import type { StageContext } from '../../context.js';
import type { LLMConfig, PipelineConfig } from '../../config.js';
import type { Article, PrivacyStatus, Script, VideoMetadata } from '../../types.js';
import { UpstreamAPIError } from '../../errors.js';
import { createChatProvider, type ChatProvider } from '../../providers/llm.js';

const MAX_TITLE = 100;
const MAX_DESCRIPTION = 5000;
const MAX_TAGS = 10;
/** Lines of dialogue quoted in the description. */
const PREVIEW_LINES = 3;

export interface MetadataDefaults {
  privacyStatus: PrivacyStatus;
  categoryId: string;
  language: string;
}

export function metadataDefaults(config: PipelineConfig): MetadataDefaults {
  return {
    privacyStatus: config.publish.youtube.privacyStatus,
    categoryId: config.publish.youtube.categoryId,
    language: config.lang,
  };
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

function tidyTags(tags: string[]): string[] {
  return [...new Set(tags.map((t) => t.trim()).filter(Boolean))]
    // YouTube rejects angle brackets in tags.
    .filter((t) => !/[<>]/.test(t))
    .slice(0, MAX_TAGS);
}

export function buildVideoMetadata(article: Article, script: Script, defaults: MetadataDefaults): VideoMetadata {
  const date = article.publishedAt?.slice(0, 10);
  const parts = [article.title];
  const preview = script.lines.slice(0, PREVIEW_LINES).map((line) => line.text);
  if (preview.length) parts.push(preview.join('\n'));
  if (article.url) parts.push(`Source: ${article.url}`);

  return {
    articleId: article.id,
    title: truncate(date ? `${article.title} - ${date}` : article.title, MAX_TITLE),
    description: truncate(parts.join('\n\n'), MAX_DESCRIPTION),
    tags: tidyTags(article.tags),
    categoryId: defaults.categoryId,
    privacyStatus: defaults.privacyStatus,
    language: defaults.language,
  };
}

/** Deterministic metadata, no model call. */
export class TemplateMetadataGenerator implements MetadataGenerator {
  constructor(private readonly defaults: MetadataDefaults) { }

  async generate(article: Article, script: Script): Promise<VideoMetadata> {
    return buildVideoMetadata(article, script, this.defaults);
  }
}

const MetadataReplySchema = z.object({
  title: z.string().trim().min(1).optional(),
  description: z.string().trim().min(1).optional(),
  tags: z
    .union([z.array(z.string()), z.string().transform((s) => s.split(','))])
    .optional(),
  category_id: z
    .union([z.string(), z.number()])
    .transform(String)
    .pipe(z.string().regex(/^\d+$/))
    .optional()
    .catch(undefined),
});

export type MetadataReply = z.infer<typeof MetadataReplySchema>;

/** JSON object from a model reply, with or without a ``` fence; undefined when unusable. */
export function parseMetadataReply(raw: string): MetadataReply | undefined {
  const fenced = /^```[a-z]*\s*\n([\s\S]*?)\n?```$/i.exec(raw.trim());
  let value: unknown;
  try {
    value = JSON.parse(fenced?.[1] ?? raw.trim());
  } catch {
    return undefined;
  }
  const parsed = MetadataReplySchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function buildMetadataPrompt(article: Article, script: Script, lang: string): { system: string; user: string } {
  return {
    system: 'You write search-friendly YouTube metadata for short technology news videos.',
    user: [
      `Write metadata for the video below (language: ${lang}). Reply with one JSON object only:`,
      '{"title": string, "description": string, "tags": string[], "category_id": string}',
      '',
      'Rules:',
      `- The title includes the date and stays under ${MAX_TITLE} characters.`,
      '- The description is about 500 characters and ends with the source URL when one is given.',
      `- At most ${MAX_TAGS} short tags.`,
      '',
      `Title: ${article.title}`,
      `Date: ${article.publishedAt ? article.publishedAt.slice(0, 10) : 'today'}`,
      article.url ? `Source: ${article.url}` : '',
      '',
      'Script:',
      script.rawText,
    ].join('\n'),
  };
}

export class LLMMetadataGenerator implements MetadataGenerator {
  private readonly llm: ChatProvider;

  constructor(
    config: LLMConfig,
    private readonly defaults: MetadataDefaults,
    llm?: ChatProvider,
  ) {
    this.llm = llm ?? createChatProvider(config);
  }

  async generate(article: Article, script: Script, ctx: StageContext): Promise<VideoMetadata> {
    const fallback = buildVideoMetadata(article, script, this.defaults);
    const prompt = buildMetadataPrompt(article, script, this.defaults.language);

    let text: string;
    try {
      const reply = await this.llm.complete(
        {
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          temperature: 0.2,
          maxTokens: 800,
        },
        ctx,
      );
      text = reply.text;
    } catch (err) {
      if (!(err instanceof UpstreamAPIError)) throw err;
      ctx.logger.warn(`Metadata model call failed (${err.message}); using the template`);
      return fallback;
    }

    const reply = parseMetadataReply(text);
    if (!reply) {
      ctx.logger.warn(`Metadata reply for article ${article.id} is not a JSON object; using the template`);
      return fallback;
    }
    const tags = tidyTags(reply.tags ?? []);
    return {
      ...fallback,
      title: reply.title ? truncate(reply.title, MAX_TITLE) : fallback.title,
      description: reply.description ? truncate(reply.description, MAX_DESCRIPTION) : fallback.description,
      tags: tags.length ? tags : fallback.tags,
      categoryId: reply.category_id ?? fallback.categoryId,
    };
  }
}
