import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  MemoryArtifactStore,
  OutputConfigSchema,
  PipelineOrchestrator,
  RemoteAvatarRenderer,
  RemoteRenderTimeoutError,
  RunInProgressError,
  TransientAPIError,
  UpstreamAPIError,
  PublishError,
  silentLogger,
  type Article,
  type PipelineConfig,
  type RenderBackend,
  type RenderBackendFactory,
  type StageName,
  type VideoMetadata,
} from '../src/index.js';
import {
  FakeAvatarApi,
  PROCESSING,
  READY,
  VirtualClock,
  article,
  makeStubs,
  testConfig,
  tmpDir,
  type Stubs,
} from './helpers.js';

const REMOTE = { apiKey: 'test-key', characterIdA: 'char-a', characterIdB: 'char-b' };

function build(stubs: Stubs, opts: { config?: PipelineConfig; remote?: RenderBackend; store?: MemoryArtifactStore } = {}) {
  const store = opts.store ?? new MemoryArtifactStore(tmpDir());
  const backends: RenderBackendFactory = {
    local: () => {
      stubs.calls.backendsBuilt++;
      return stubs.localBackend;
    },
    remote: () => {
      stubs.calls.backendsBuilt++;
      if (!opts.remote) throw new Error('no remote backend in this test');
      return opts.remote;
    },
  };
  const orchestrator = new PipelineOrchestrator({
    config: opts.config ?? testConfig(),
    collaborators: stubs.collaborators,
    backends,
    store,
    logger: silentLogger,
  });
  return { orchestrator, store };
}

function stageStatus(run: { stages: { stage: StageName; status: string }[] }, name: StageName): string | undefined {
  return run.stages.find((s) => s.stage === name)?.status;
}

describe('PipelineOrchestrator', () => {
  it('renders locally and publishes when no remote key is set', async () => {
    const stubs = makeStubs();
    const { orchestrator, store } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('completed');
    expect(run.backend).toBe('local');
    expect(run.articleId).toBe(123);
    expect(run.publishedUrl).toBe('https://www.youtube.com/watch?v=test-video');
    expect(run.video?.origin).toBe('local');
    expect(run.phase).toBe('done');
    expect(stubs.calls.local).toBe(1);
    expect(stubs.calls.notify).toBe(1);
    expect(run.stages.map((s) => s.status)).toEqual([
      'completed', 'completed', 'completed', 'completed', 'completed', 'completed', 'completed',
    ]);
    expect(store.runs).toHaveLength(1);
  });

  it('renders remotely after three polls without touching the local backend', async () => {
    const stubs = makeStubs();
    const api = new FakeAvatarApi([PROCESSING, PROCESSING, READY]);
    const config = testConfig({ remote: REMOTE });
    const remote = new RemoteAvatarRenderer(api, config.remote, {
      output: OutputConfigSchema.parse({}),
      clock: new VirtualClock(),
    });
    const { orchestrator } = build(stubs, { config, remote });

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('completed');
    expect(run.backend).toBe('remote');
    expect(run.video?.origin).toBe('remote');
    expect(run.video?.jobId).toBe('job-1');
    expect(api.polls).toBe(3);
    expect(stubs.calls.local).toBe(0);
  });

  it('fails with NOT_FOUND and writes nothing for an unknown article', async () => {
    const stubs = makeStubs();
    const { orchestrator, store } = build(stubs);

    const run = await orchestrator.run({ articleId: 999 });

    expect(run.status).toBe('failed');
    expect(run.error?.code).toBe('NOT_FOUND');
    expect(run.error?.stage).toBe('fetch');
    expect(stubs.calls.script).toBe(0);
    expect(store.size).toBe(0);
    expect(store.runs).toHaveLength(0);
    expect(stubs.calls.notify).toBe(1);
  });

  it('records a timed out remote job and resumes at render on the next run', async () => {
    const stubs = makeStubs();
    let renders = 0;
    const flaky: RenderBackend = {
      kind: 'remote',
      async render(inputs, ctx) {
        renders++;
        if (renders === 1) throw new RemoteRenderTimeoutError(
            { id: 'job-1', status: 'timed_out', backend: 'remote', createdAt: '2024-05-01T00:00:00Z' },
            10,
            2,
          );
        return {
          articleId: ctx.articleId,
          path: path.join(ctx.artifactDir, 'video.mp4'),
          origin: 'remote',
          durationSec: inputs.audio.durationSec,
          bytes: 2048,
          jobId: 'job-2',
        };
      },
    };
    const config = testConfig({ remote: REMOTE });
    const { orchestrator, store } = build(stubs, { config, remote: flaky });

    const first = await orchestrator.run({ articleId: 123 });
    expect(first.status).toBe('failed');
    expect(first.error?.stage).toBe('render');
    expect(first.error?.code).toBe('REMOTE_RENDER_TIMEOUT');
    expect(first.error?.jobId).toBe('job-1');
    expect(stageStatus(first, 'render')).toBe('failed');

    const second = await orchestrator.run({ articleId: 123 });
    expect(second.status).toBe('completed');
    expect(second.video?.jobId).toBe('job-2');
    expect(stageStatus(second, 'script')).toBe('cached');
    expect(stageStatus(second, 'audio')).toBe('cached');
    expect(stageStatus(second, 'subtitles')).toBe('cached');
    expect(stageStatus(second, 'background')).toBe('cached');
    expect(stageStatus(second, 'render')).toBe('completed');
    expect(stubs.calls).toMatchObject({ script: 1, audio: 1, subtitles: 1, background: 1, publish: 1 });
    expect(renders).toBe(2);
    expect(store.runs).toHaveLength(2);
  });

  it('generates the background at most once per article', async () => {
    const stubs = makeStubs();
    const { orchestrator } = build(stubs);

    await orchestrator.run({ articleId: 123 });
    const again = await orchestrator.run({ articleId: 123 });

    expect(again.status).toBe('completed');
    expect(again.publishedUrl).toBe('https://www.youtube.com/watch?v=test-video');
    expect(stubs.calls.background).toBe(1);
    expect(stubs.calls.local).toBe(1);
    expect(stubs.calls.publish).toBe(1);
  });

  it('keeps the background when narration fails', async () => {
    const stubs = makeStubs();
    const narrator = stubs.collaborators.narrator;
    let failNarration = true;
    stubs.collaborators.narrator = {
      synthesize: async (s, ctx) => {
        if (failNarration) throw new UpstreamAPIError('TTS HTTP 401', 401);
        return narrator.synthesize(s, ctx);
      },
    };
    const { orchestrator } = build(stubs);

    const first = await orchestrator.run({ articleId: 123 });
    expect(first.status).toBe('failed');
    expect(first.error?.stage).toBe('audio');
    expect(first.error?.code).toBe('UPSTREAM_API');
    expect(first.phase).toBe('narrating');
    expect(stubs.calls.background).toBe(1);

    failNarration = false;
    const second = await orchestrator.run({ articleId: 123 });
    expect(second.status).toBe('completed');
    expect(stubs.calls.background).toBe(1);
    expect(stageStatus(second, 'background')).toBe('cached');
  });

  it('degrades to skipped_publish when the upload fails', async () => {
    const stubs = makeStubs();
    stubs.collaborators.publisher = {
      publish: async () => {
        throw new PublishError('YouTube upload HTTP 403');
      },
    };
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('skipped_publish');
    expect(run.video?.path).toBeDefined();
    expect(run.publishedUrl).toBeUndefined();
    expect(run.publishError?.code).toBe('PUBLISH');
    expect(run.publishError?.message).toBe('YouTube upload HTTP 403');
    expect(run.error).toBeUndefined();
  });

  it('skips publishing when no publisher is configured', async () => {
    const stubs = makeStubs();
    stubs.collaborators.publisher = undefined;
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('skipped_publish');
    expect(stageStatus(run, 'publish')).toBe('skipped');
    expect(run.publishError).toBeUndefined();
  });

  it('waits in illustrating when the background fails after the narration', async () => {
    const stubs = makeStubs();
    stubs.collaborators.artist = {
      generate: async () => {
        throw new UpstreamAPIError('Image HTTP 400', 400);
      },
    };
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('failed');
    expect(run.phase).toBe('illustrating');
    expect(run.error?.stage).toBe('background');
    expect(stageStatus(run, 'subtitles')).toBe('completed');
  });

  it('publishes with the article template when no metadata generator is set', async () => {
    const stubs = makeStubs();
    const sent: VideoMetadata[] = [];
    stubs.collaborators.publisher = {
      publish: async (_video, metadata) => {
        sent.push(metadata);
        return 'https://www.youtube.com/watch?v=test-video';
      },
    };
    const { orchestrator, store } = build(stubs);

    await orchestrator.run({ articleId: 123 });

    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      articleId: 123,
      title: 'Article 123 - 2024-05-01',
      tags: ['ai'],
      categoryId: '28',
      privacyStatus: 'unlisted',
      language: 'ja',
    });
    expect(await store.cache('metadata').get('123')).toEqual(sent[0]);
  });

  it('reuses stored metadata when a failed upload is tried again', async () => {
    const stubs = makeStubs();
    let generated = 0;
    stubs.collaborators.metadata = {
      generate: async (a) => {
        generated++;
        return {
          articleId: a.id,
          title: `Generated ${generated}`,
          description: 'Summary',
          tags: ['news'],
          categoryId: '25',
          privacyStatus: 'private',
          language: 'ja',
        };
      },
    };
    const titles: string[] = [];
    let failUpload = true;
    stubs.collaborators.publisher = {
      publish: async (_video, metadata) => {
        titles.push(metadata.title);
        if (failUpload) throw new PublishError('YouTube upload HTTP 500');
        return 'https://www.youtube.com/watch?v=test-video';
      },
    };
    const { orchestrator } = build(stubs);

    const first = await orchestrator.run({ articleId: 123 });
    failUpload = false;
    const second = await orchestrator.run({ articleId: 123 });

    expect(first.status).toBe('skipped_publish');
    expect(second.status).toBe('completed');
    expect(generated).toBe(1);
    expect(titles).toEqual(['Generated 1', 'Generated 1']);
  });

  it('fails on a partial remote configuration before any collaborator call', async () => {
    const stubs = makeStubs();
    const config = testConfig({ remote: { apiKey: 'test-key', characterIdA: 'char-a' } });
    const { orchestrator } = build(stubs, { config });

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('failed');
    expect(run.error?.code).toBe('CONFIGURATION');
    expect(run.error?.stage).toBe('render');
    expect(stubs.calls).toMatchObject({ fetch: 0, script: 0, audio: 0, background: 0, backendsBuilt: 0 });
  });

  it('rejects a second concurrent run for the same article', async () => {
    const stubs = makeStubs();
    let releaseFetch: () => void = () => { };
    const gate = new Promise<void>((resolve) => {
      releaseFetch = resolve;
    });
    stubs.collaborators.source = {
      fetch: async (id): Promise<Article> => {
        await gate;
        return article(id ?? 123);
      },
    };
    const { orchestrator } = build(stubs);

    const first = orchestrator.run({ articleId: 123 });
    await expect(orchestrator.run({ articleId: 123 })).rejects.toBeInstanceOf(RunInProgressError);
    const other = orchestrator.run({ articleId: 124 });

    releaseFetch();
    expect((await first).status).toBe('completed');
    expect((await other).status).toBe('completed');
    expect(orchestrator.lock.isHeld(123)).toBe(false);
  });

  it('resolves the latest article and records it', async () => {
    const stubs = makeStubs({ latestId: 124 });
    const { orchestrator, store } = build(stubs);

    const run = await orchestrator.run();

    expect(run.requestedArticleId).toBeUndefined();
    expect(run.articleId).toBe(124);
    expect(run.status).toBe('completed');
    expect(store.runs[0]?.articleId).toBe(124);
  });

  it('retries transient failures and counts the attempts', async () => {
    const stubs = makeStubs();
    const scripts = stubs.collaborators.scripts;
    let calls = 0;
    stubs.collaborators.scripts = {
      generate: async (a, ctx) => {
        calls++;
        if (calls === 1) throw new TransientAPIError('LLM HTTP 503', 503);
        return scripts.generate(a, ctx);
      },
    };
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('completed');
    expect(run.stages.find((s) => s.stage === 'script')?.attempts).toBe(2);
  });

  it('never retries the render stage', async () => {
    const stubs = makeStubs();
    let renders = 0;
    stubs.localBackend.render = async () => {
      renders++;
      throw new TransientAPIError('render backend HTTP 502', 502);
    };
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('failed');
    expect(run.error?.stage).toBe('render');
    expect(renders).toBe(1);
  });

  it('reports cache hits as stage:skip events', async () => {
    const stubs = makeStubs();
    const { orchestrator } = build(stubs);
    await orchestrator.run({ articleId: 123 });

    const skipped: string[] = [];
    orchestrator.on('stage:skip', (e) => skipped.push(`${e.stage}:${e.reason}`));
    await orchestrator.run({ articleId: 123 });

    expect(skipped).toEqual([
      'script:cache-hit',
      'audio:cache-hit',
      'background:cache-hit',
      'subtitles:cache-hit',
      'render:cache-hit',
      'publish:cache-hit',
    ]);
  });

  it('ends as CANCELLED when the signal fires mid-run', async () => {
    const stubs = makeStubs();
    const controller = new AbortController();
    const scripts = stubs.collaborators.scripts;
    stubs.collaborators.scripts = {
      generate: async (a, ctx) => {
        const s = await scripts.generate(a, ctx);
        controller.abort();
        return s;
      },
    };
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123, signal: controller.signal });

    expect(run.status).toBe('failed');
    expect(run.error?.code).toBe('CANCELLED');
    expect(run.error?.stage).toBe('audio');
    expect(stubs.calls.audio).toBe(0);
    expect(stubs.calls.background).toBe(0);
  });

  it('does not let a failing notifier change the outcome', async () => {
    const stubs = makeStubs();
    stubs.collaborators.notifier = {
      notify: async () => {
        throw new Error('webhook down');
      },
    };
    const { orchestrator } = build(stubs);

    const run = await orchestrator.run({ articleId: 123 });

    expect(run.status).toBe('completed');
  });
});
