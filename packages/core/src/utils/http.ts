/**
 * @module utils/http
 * fetch wrappers that sort upstream failures into retryable and fatal ones.
 */

import { TransientAPIError, UpstreamAPIError } from '../errors.js';

/** 429 and 5xx are worth another attempt; everything else is not. */
export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * `fetch` that turns network failures into {@link TransientAPIError}.
 * Aborts propagate unchanged.
 */
export async function fetchOrThrow(
  label: string,
  url: string,
  init: RequestInit = {},
): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (err) {
    if (init.signal?.aborted) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new TransientAPIError(`${label} network error: ${msg}`, undefined, err);
  }
}

/** Throw the matching error for a non-2xx response, with a trimmed body. */
export async function ensureOk(label: string, res: Response): Promise<Response> {
  if (res.ok) return res;
  const body = (await res.text().catch(() => '')).slice(0, 500);
  const msg = `${label} HTTP ${res.status}${body ? `: ${body}` : ''}`;
  if (isTransientStatus(res.status)) throw new TransientAPIError(msg, res.status);
  throw new UpstreamAPIError(msg, res.status);
}

/** Fetch, check the status and parse the JSON body. */
export async function fetchJson(label: string, url: string, init: RequestInit = {}): Promise<unknown> {
  const res = await ensureOk(label, await fetchOrThrow(label, url, init));
  try {
    return await res.json();
  } catch (err) {
    throw new UpstreamAPIError(`${label} returned invalid JSON`, res.status, err);
  }
}
