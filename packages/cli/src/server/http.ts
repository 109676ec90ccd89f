/**
 * @module server/http
 * node:http transport for {@link routeRequest}. A client that disconnects
 * before the response is written aborts its run.
 */

import http from 'node:http';
import { toError, type Logger } from '@article2video/core';
import { routeRequest, type RouteDeps } from './routes.js';

const MAX_BODY_BYTES = 64 * 1024;

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

function send(res: http.ServerResponse, status: number, body: unknown): void {
  if (res.writableEnded || res.destroyed) return;
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'content-length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

async function handle(req: http.IncomingMessage, res: http.ServerResponse, deps: RouteDeps): Promise<void> {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
  });

  let body: string;
  try {
    body = await readBody(req);
  } catch (err) {
    send(res, 413, { error: toError(err).message });
    return;
  }

  const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
  const result = await routeRequest(req.method ?? 'GET', pathname, body, deps, controller.signal);
  send(res, result.status, result.body);
  deps.logger.info(`${req.method ?? 'GET'} ${pathname} → ${result.status}`);
}

export function createHttpServer(deps: RouteDeps): http.Server {
  return http.createServer((req, res) => {
    handle(req, res, deps).catch((err: unknown) => {
      deps.logger.error(`Unhandled request error: ${toError(err).message}`);
      send(res, 500, { error: 'Internal server error' });
    });
  });
}

export function listen(server: http.Server, port: number, host: string, logger: Logger): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`Listening on http://${host}:${port}`);
      resolve();
    });
  });
}
