/**
 * @module stages/ingest/esa
 * Article source backed by the esa.io REST API.
 *
 *   by id:  GET {baseUrl}/teams/{team}/posts/{number}
 *   latest: GET {baseUrl}/teams/{team}/posts?sort=created&order=desc&wip=false
 *           first with the configured category/tag filter. Unless that yields
 *           today's post (JST), the list is fetched again without the filter.
 *
 * A post's date is its `published_at`, else a date written in its title
 * (`2024-05-01`, `2024/05/01`, `2024年05月01日`), else `created_at`, else
 * `updated_at`. From a list, today's post wins; otherwise the newest dated
 * post; otherwise the first.
 */

import { z } from 'zod';
import type { ArticleSource } from '../../collaborators.js';
import type { PipelineContext } from '../../context.js';
import type { ArticleSourceConfig } from '../../config.js';
import type { Article } from '../../types.js';
import { NotFoundError, UpstreamAPIError } from '../../errors.js';
import { ensureOk, fetchOrThrow } from '../../utils/http.js';

const EsaPostSchema = z.object({
  number: z.number().int(),
  name: z.string().default(''),
  body_md: z.string().default(''),
  tags: z.array(z.string()).default([]),
  url: z.string().optional(),
  wip: z.boolean().default(false),
  published_at: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

const EsaPostListSchema = z.object({ posts: z.array(EsaPostSchema).default([]) });

export type EsaPost = z.infer<typeof EsaPostSchema>;

const JST_OFFSET_MS = 9 * 60 * 60 * 1000;
const TITLE_DATE = /(20\d{2})[-/年](\d{2})[-/月](\d{2})/;

/** Calendar day of `date` in JST, as `YYYY-MM-DD`. */
export function jstDay(date: Date): string {
  return new Date(date.getTime() + JST_OFFSET_MS).toISOString().slice(0, 10);
}

function dayOfTimestamp(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : jstDay(parsed);
}

function dayOfTitle(title: string): string | undefined {
  const match = TITLE_DATE.exec(title);
  if (!match) return undefined;
  const [, year, month, day] = match;
  const candidate = `${year}-${month}-${day}`;
  const parsed = new Date(`${candidate}T00:00:00Z`);
  // Rejects impossible dates such as 2024-02-30, which Date rolls over.
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(candidate) ? candidate : undefined;
}

export function postDay(post: EsaPost): string | undefined {
  return (
    dayOfTimestamp(post.published_at) ??
    dayOfTitle(post.name) ??
    dayOfTimestamp(post.created_at) ??
    dayOfTimestamp(post.updated_at)
  );
}

export interface PostPick {
  post: EsaPost;
  day?: string;
}

export function pickPost(posts: EsaPost[], today: string): PostPick | undefined {
  const dated = posts.map((post) => ({ post, day: postDay(post) }));
  const todays = dated.find((p) => p.day === today);
  if (todays) return todays;

  let newest: PostPick | undefined;
  for (const candidate of dated) {
    if (candidate.day === undefined) continue;
    if (!newest?.day || candidate.day > newest.day) newest = candidate;
  }
  return newest ?? dated[0];
}

export function toArticle(post: EsaPost): Article {
  return {
    id: post.number,
    title: post.name,
    body: post.body_md,
    publishedAt: post.published_at ?? post.created_at ?? post.updated_at ?? undefined,
    url: post.url,
    tags: post.tags,
  };
}

export class EsaArticleSource implements ArticleSource {
  private readonly baseUrl: string;

  constructor(
    private readonly config: ArticleSourceConfig,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async fetch(articleId: number | undefined, ctx: PipelineContext): Promise<Article> {
    if (articleId !== undefined) return this.byId(articleId, ctx);

    const today = jstDay(this.now());
    const filters = this.filterParams();
    let filtered: PostPick | undefined;
    if (Object.keys(filters).length > 0) {
      filtered = await this.newest(filters, today, ctx);
      if (filtered?.day === today) return toArticle(filtered.post);
      ctx.logger.info(
        filtered
          ? `Filtered pick ${filtered.post.number} is dated ${filtered.day ?? 'unknown'}, not ${today}; retrying without the filter`
          : 'No post matches the category/tag filter; retrying without it',
      );
    }

    const pick = (await this.newest({}, today, ctx)) ?? filtered;
    if (!pick) throw new NotFoundError('No published article found');
    if (pick.day !== today) {
      ctx.logger.info(`No post dated ${today}; using post ${pick.post.number} (${pick.day ?? 'undated'})`);
    }
    return toArticle(pick.post);
  }

  private async byId(articleId: number, ctx: PipelineContext): Promise<Article> {
    const res = await this.request(`/posts/${articleId}`, {}, ctx);
    if (res.status === 404) {
      throw new NotFoundError(`Article ${articleId} not found`, articleId);
    }
    const parsed = EsaPostSchema.safeParse(await this.json(res));
    if (!parsed.success) {
      throw new UpstreamAPIError(`esa returned an unexpected payload for post ${articleId}`);
    }
    return toArticle(parsed.data);
  }

  private async newest(
    filters: Record<string, string>,
    today: string,
    ctx: PipelineContext,
  ): Promise<PostPick | undefined> {
    const res = await this.request(
      '/posts',
      { per_page: '10', sort: 'created', order: 'desc', wip: 'false', ...filters },
      ctx,
    );
    const parsed = EsaPostListSchema.safeParse(await this.json(res));
    if (!parsed.success) {
      throw new UpstreamAPIError('esa returned an unexpected post list');
    }
    return pickPost(
      parsed.data.posts.filter((p) => !p.wip),
      today,
    );
  }

  private filterParams(): Record<string, string> {
    const params: Record<string, string> = {};
    if (this.config.category) params.category = this.config.category;
    if (this.config.tag) params.q = `tag:${this.config.tag}`;
    return params;
  }

  private async request(
    route: string,
    query: Record<string, string>,
    ctx: PipelineContext,
  ): Promise<Response> {
    const qs = new URLSearchParams(query).toString();
    const url = `${this.baseUrl}/teams/${encodeURIComponent(this.config.team)}${route}${qs ? `?${qs}` : ''}`;
    ctx.logger.debug(`esa GET ${route}${qs ? `?${qs}` : ''}`);
    const res = await fetchOrThrow('esa', url, {
      headers: { authorization: `Bearer ${this.config.apiToken}` },
      signal: ctx.signal,
    });
    return res.status === 404 ? res : ensureOk('esa', res);
  }

  private async json(res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new UpstreamAPIError('esa returned invalid JSON', res.status, err);
    }
  }
}
