import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  NotFoundError,
  PipelineConfigSchema,
  PipelineEmitter,
  silentLogger,
  type Article,
  type AudioTrack,
  type AvatarApi,
  type BackgroundImage,
  type Clock,
  type Collaborators,
  type PipelineConfig,
  type PipelineConfigInput,
  type RemoteStatusReport,
  type RenderBackend,
  type RenderInputs,
  type Script,
  type StageContext,
  type SubtitleSet,
  type VideoArtifact,
} from '../src/index.js';

export function tmpDir(prefix = 'a2v-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return PipelineConfigSchema.parse({ retry: { maxAttempts: 3, backoffMs: 0 }, ...input });
}

export function makeContext(
  opts: { config?: PipelineConfig; signal?: AbortSignal; articleId?: number; artifactDir?: string } = {},
): StageContext {
  return {
    config: opts.config ?? testConfig(),
    emitter: new PipelineEmitter(),
    runId: 'run-test',
    signal: opts.signal ?? new AbortController().signal,
    logger: silentLogger,
    articleId: opts.articleId ?? 123,
    artifactDir: opts.artifactDir ?? tmpDir(),
  };
}

/** Clock whose sleeps advance time instantly. */
export class VirtualClock implements Clock {
  t = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw signal.reason;
    this.sleeps.push(ms);
    this.t += ms;
  }
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export function article(id = 123): Article {
  return { id, title: `Article ${id}`, body: '# Heading\nBody text.', publishedAt: '2024-05-01T09:00:00Z', tags: ['ai'] };
}

export function script(articleId = 123): Script {
  return {
    articleId,
    lines: [
      { speaker: 'A', text: 'Hello' },
      { speaker: 'B', text: 'Hi there' },
    ],
    rawText: 'A: Hello\nB: Hi there',
  };
}

export function audio(articleId = 123, dir = '/tmp/a2v'): AudioTrack {
  return {
    articleId,
    path: path.join(dir, 'audio.mp3'),
    durationSec: 6,
    lines: [
      { index: 0, speaker: 'A', text: 'Hello', start: 0, end: 3 },
      { index: 1, speaker: 'B', text: 'Hi there', start: 3, end: 6 },
    ],
  };
}

export function subtitles(articleId = 123, dir = '/tmp/a2v'): SubtitleSet {
  return {
    articleId,
    path: path.join(dir, 'subtitles.srt'),
    cues: [
      { text: 'Hello', start: 0, end: 3 },
      { text: 'Hi there', start: 3, end: 6 },
    ],
  };
}

export function background(articleId = 123, dir = '/tmp/a2v'): BackgroundImage {
  return { articleId, path: path.join(dir, 'background.png'), prompt: 'abstract' };
}

export function renderInputs(articleId = 123, dir = '/tmp/a2v'): RenderInputs {
  return {
    article: article(articleId),
    script: script(articleId),
    audio: audio(articleId, dir),
    subtitles: subtitles(articleId, dir),
    background: background(articleId, dir),
  };
}

// ---------------------------------------------------------------------------
// Stub collaborators with call counters
// ---------------------------------------------------------------------------

export interface CallCounts {
  fetch: number;
  script: number;
  audio: number;
  subtitles: number;
  background: number;
  publish: number;
  notify: number;
  local: number;
  remote: number;
  backendsBuilt: number;
}

export interface Stubs {
  calls: CallCounts;
  collaborators: Collaborators;
  localBackend: RenderBackend;
}

export function makeStubs(opts: { knownIds?: number[]; latestId?: number; publishUrl?: string } = {}): Stubs {
  const known = new Set(opts.knownIds ?? [123, 124]);
  const calls: CallCounts = {
    fetch: 0,
    script: 0,
    audio: 0,
    subtitles: 0,
    background: 0,
    publish: 0,
    notify: 0,
    local: 0,
    remote: 0,
    backendsBuilt: 0,
  };

  const collaborators: Collaborators = {
    source: {
      async fetch(articleId) {
        calls.fetch++;
        const id = articleId ?? opts.latestId ?? 123;
        if (!known.has(id)) throw new NotFoundError(`Article ${id} not found`, id);
        return article(id);
      },
    },
    scripts: {
      async generate(a) {
        calls.script++;
        return script(a.id);
      },
    },
    narrator: {
      async synthesize(s, ctx) {
        calls.audio++;
        return audio(s.articleId, ctx.artifactDir);
      },
    },
    aligner: {
      async align(a, _s, ctx) {
        calls.subtitles++;
        return subtitles(a.articleId, ctx.artifactDir);
      },
    },
    artist: {
      async generate(a, ctx) {
        calls.background++;
        return background(a.id, ctx.artifactDir);
      },
    },
    publisher: {
      async publish() {
        calls.publish++;
        return opts.publishUrl ?? 'https://www.youtube.com/watch?v=test-video';
      },
    },
    notifier: {
      async notify() {
        calls.notify++;
      },
    },
  };

  const localBackend: RenderBackend = {
    kind: 'local',
    async render(inputs, ctx): Promise<VideoArtifact> {
      calls.local++;
      return {
        articleId: ctx.articleId,
        path: path.join(ctx.artifactDir, 'video.mp4'),
        origin: 'local',
        durationSec: inputs.audio.durationSec,
        bytes: 1024,
      };
    },
  };

  return { calls, collaborators, localBackend };
}

// ---------------------------------------------------------------------------
// Remote API fake
// ---------------------------------------------------------------------------

export class FakeAvatarApi implements AvatarApi {
  submits = 0;
  polls = 0;
  downloads = 0;
  readonly cancels: string[] = [];
  /** Called after each status report is chosen. */
  onPoll?: (poll: number) => void;

  constructor(
    private readonly statuses: RemoteStatusReport[],
    private readonly bytes: Uint8Array = new Uint8Array([1, 2, 3, 4]),
  ) { }

  async submit(): Promise<string> {
    this.submits++;
    return 'job-1';
  }

  async status(): Promise<RemoteStatusReport> {
    const report = this.statuses[Math.min(this.polls, this.statuses.length - 1)];
    this.polls++;
    this.onPoll?.(this.polls);
    return report;
  }

  async download(): Promise<Uint8Array> {
    this.downloads++;
    return this.bytes;
  }

  async cancel(jobId: string): Promise<void> {
    this.cancels.push(jobId);
  }
}

export const READY: RemoteStatusReport = { status: 'ready', downloadUrl: 'https://cdn.example.test/video.mp4' };
export const PROCESSING: RemoteStatusReport = { status: 'processing' };
