/**
 * @module server/routes
 * Request routing for the HTTP surface, independent of the transport.
 *
 *   GET  /health        → 200 {"status":"ok"}
 *   POST /pipeline/run  → blocks until the run ends
 *        200 completed | skipped_publish, 400 bad body, 404 unknown article,
 *        409 run in progress, 500 any other failure
 */

import { z } from 'zod';
import {
  RunInProgressError,
  toError,
  type Logger,
  type PipelineRun,
  type RunRequest,
} from '@article2video/core';

export type RunPipeline = (req: RunRequest) => Promise<PipelineRun>;

export interface RouteDeps {
  runPipeline: RunPipeline;
  logger: Logger;
}

export interface RouteResult {
  status: number;
  body: unknown;
}

const RunBodySchema = z
  .object({ article_id: z.number().int().positive().nullish() })
  .passthrough();

function parseBody(raw: string): { ok: true; articleId?: number } | { ok: false; error: string } {
  let json: unknown = {};
  if (raw.trim()) {
    try {
      json = JSON.parse(raw);
    } catch {
      return { ok: false, error: 'Request body is not valid JSON' };
    }
  }
  const parsed = RunBodySchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `Invalid request body: ${where}${issue?.message ?? 'unexpected shape'}` };
  }
  return { ok: true, articleId: parsed.data.article_id ?? undefined };
}

function statusForRun(run: PipelineRun): number {
  if (run.status === 'completed' || run.status === 'skipped_publish') return 200;
  return run.error?.code === 'NOT_FOUND' ? 404 : 500;
}

export async function routeRequest(
  method: string,
  pathname: string,
  rawBody: string,
  deps: RouteDeps,
  signal?: AbortSignal,
): Promise<RouteResult> {
  if (pathname === '/health') {
    if (method !== 'GET') return { status: 405, body: { error: 'Method not allowed' } };
    return { status: 200, body: { status: 'ok' } };
  }

  if (pathname === '/pipeline/run') {
    if (method !== 'POST') return { status: 405, body: { error: 'Method not allowed' } };

    const body = parseBody(rawBody);
    if (!body.ok) return { status: 400, body: { error: body.error } };

    try {
      const run = await deps.runPipeline({ articleId: body.articleId, signal });
      const status = statusForRun(run);
      return status === 200 ? { status, body: run } : { status, body: { error: run.error?.message, run } };
    } catch (err) {
      if (err instanceof RunInProgressError) {
        return { status: 409, body: { error: err.message, article_id: err.articleId } };
      }
      deps.logger.error(`Pipeline request failed: ${toError(err).message}`);
      return { status: 500, body: { error: toError(err).message } };
    }
  }

  return { status: 404, body: { error: 'Not found' } };
}
