/**
 * @module events
 * Progress events a run publishes while it works. The CLI spinner and tests
 * subscribe to these; nothing in the pipeline depends on a listener.
 */

import { EventEmitter } from 'node:events';
import type { PipelineRun, RenderJobStatus, StageName } from './types.js';

export interface PipelineEventMap {
  'run:start': { runId: string; requestedArticleId?: number };
  'stage:start': { runId: string; stage: StageName; attempt: number };
  'stage:progress': { runId: string; stage: StageName; message: string; percent?: number };
  'stage:complete': { runId: string; stage: StageName; durationMs: number };
  /** `cache-hit` when the artifact was already on disk for this article. */
  'stage:skip': { runId: string; stage: StageName; reason: 'cache-hit' | 'not-configured' };
  'stage:error': { runId: string; stage: StageName; error: Error; willRetry: boolean };
  'render:poll': { runId: string; jobId: string; poll: number; maxPolls: number; status: RenderJobStatus };
  'run:complete': { run: PipelineRun };
}

export type PipelineEventName = keyof PipelineEventMap;

export class PipelineEmitter {
  private readonly inner = new EventEmitter();

  on<K extends PipelineEventName>(event: K, listener: (payload: PipelineEventMap[K]) => void): this {
    this.inner.on(event, listener);
    return this;
  }

  emit<K extends PipelineEventName>(event: K, payload: PipelineEventMap[K]): boolean {
    return this.inner.emit(event, payload);
  }
}
