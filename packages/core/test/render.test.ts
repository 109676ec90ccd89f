import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigurationError,
  HttpAvatarApi,
  LocalRenderError,
  LocalSlideshowRenderer,
  OutputConfigSchema,
  RemoteRenderConfigSchema,
  buildSlideshowFilter,
  buildSubmission,
  escapeFilterValue,
  mapRemoteStatus,
  selectRenderBackend,
  type CommandRunner,
} from '../src/index.js';
import { audio, makeContext, renderInputs, tmpDir } from './helpers.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('selectRenderBackend', () => {
  it('picks local without an API key', () => {
    expect(selectRenderBackend(RemoteRenderConfigSchema.parse({ characterIdA: 'char-a' }))).toEqual({ kind: 'local' });
  });

  it('picks remote when key and both characters are set', () => {
    const settings = RemoteRenderConfigSchema.parse({ apiKey: 'test-key', characterIdA: 'a', characterIdB: 'b' });
    expect(selectRenderBackend(settings)).toEqual({ kind: 'remote', settings });
  });

  it('rejects a key without character ids', () => {
    let caught: unknown;
    try {
      selectRenderBackend(RemoteRenderConfigSchema.parse({ apiKey: 'test-key', characterIdB: 'b' }));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.fields).toEqual(['remote.characterIdA']);
    expect(caught.message).toBe('Remote rendering is enabled but remote.characterIdA is not set');
  });
});

describe('remote wire contract', () => {
  const settings = RemoteRenderConfigSchema.parse({
    apiKey: 'test-key',
    baseUrl: 'https://avatar.example.test/api/',
    characterIdA: 'char-a',
    characterIdB: 'char-b',
  });

  it('maps status strings case-insensitively', () => {
    expect(mapRemoteStatus('Completed')).toBe('ready');
    expect(mapRemoteStatus(' in_progress ')).toBe('processing');
    expect(mapRemoteStatus('error')).toBe('failed');
    expect(mapRemoteStatus('exploded')).toBeUndefined();
  });

  it('builds a per-line timeline with speaker characters', () => {
    const submission = buildSubmission(audio(), settings, OutputConfigSchema.parse({}));
    expect(submission.audioPath).toBe(path.join('/tmp/a2v', 'audio.mp3'));
    expect(submission.payload).toEqual({
      characters: { a: 'char-a', b: 'char-b' },
      timeline: [
        { index: 0, speaker: 'A', character: 'char-a', start: 0, end: 3, text: 'Hello' },
        { index: 1, speaker: 'B', character: 'char-b', start: 3, end: 6, text: 'Hi there' },
      ],
    });
  });

  it('adds the scene only when one is configured', () => {
    const withScene = RemoteRenderConfigSchema.parse({ ...settings, sceneId: 'studio' });
    const submission = buildSubmission(audio(), withScene, OutputConfigSchema.parse({ width: 1280, height: 720 }));
    expect(submission.payload.scene).toEqual({ id: 'studio', width: 1280, height: 720 });
  });

  it('reads status responses', async () => {
    const urls: string[] = [];
    const bodies = [
      { status: 'COMPLETED', download_url: 'https://cdn.example.test/v.mp4' },
      { status: 'completed' },
      { status: 'mystery' },
      { status: 'failed', error: 'bad audio' },
    ];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) => {
        urls.push(url);
        return Response.json(bodies[urls.length - 1]);
      }),
    );
    const api = new HttpAvatarApi(settings);
    const signal = new AbortController().signal;

    expect(await api.status('job-1', signal)).toEqual({
      status: 'ready',
      downloadUrl: 'https://cdn.example.test/v.mp4',
      message: undefined,
    });
    expect((await api.status('job-1', signal)).status).toBe('processing');
    expect((await api.status('job-1', signal)).status).toBe('queued');
    expect(await api.status('job-1', signal)).toEqual({
      status: 'failed',
      downloadUrl: undefined,
      message: 'bad audio',
    });
    expect(urls[0]).toBe('https://avatar.example.test/api/public/generations/job-1');
  });
});

describe('buildSlideshowFilter', () => {
  it('scales, crops and overlays one drawtext per cue', () => {
    const filter = buildSlideshowFilter({
      width: 1280,
      height: 720,
      cues: [
        { textFile: 'cue-0000.txt', start: 0, end: 2.5 },
        { textFile: 'cue-0001.txt', start: 2.5, end: 4 },
      ],
    });
    const drawtext = (file: string, start: string, end: string) =>
      `drawtext=textfile=${file}:fontsize=33:fontcolor=white:box=1:boxcolor=black@0.55:boxborderw=16:` +
      `x=(w-text_w)/2:y=h-text_h-60:enable='between(t,${start},${end})'`;

    expect(filter).toBe(
      '[0:v]scale=1280:720:force_original_aspect_ratio=increase,crop=1280:720,setsar=1,' +
        `${drawtext('cue-0000.txt', '0.000', '2.500')},${drawtext('cue-0001.txt', '2.500', '4.000')}[v]`,
    );
  });

  it('escapes filter metacharacters in values', () => {
    expect(escapeFilterValue("C:\\fonts\\it's,bold.ttf")).toBe("C\\:\\\\fonts\\\\it\\'s\\,bold.ttf");
  });
});

describe('LocalSlideshowRenderer', () => {
  function fixture() {
    const dir = tmpDir();
    const inputs = renderInputs(123, dir);
    fs.writeFileSync(inputs.background.path, 'png');
    fs.writeFileSync(inputs.audio.path, 'mp3');
    return { dir, inputs, ctx: makeContext({ artifactDir: dir }) };
  }

  it('composes the video with ffmpeg', async () => {
    const { dir, inputs, ctx } = fixture();
    const invocations: Array<{ bin: string; args: string[]; cwd?: string }> = [];
    const runner: CommandRunner = async (bin, args, opts) => {
      invocations.push({ bin, args, cwd: opts?.cwd });
      fs.writeFileSync(args[args.length - 1] ?? '', 'video-bytes');
      return { stdout: '', stderr: '', exitCode: 0 };
    };

    const video = await new LocalSlideshowRenderer({ output: OutputConfigSchema.parse({}), runner }).render(inputs, ctx);

    expect(video).toEqual({
      articleId: 123,
      path: path.join(dir, 'video.mp4'),
      origin: 'local',
      durationSec: 6,
      bytes: 11,
    });
    expect(invocations).toHaveLength(1);
    expect(invocations[0]?.cwd).toBe(path.join(dir, 'slideshow'));
    expect(invocations[0]?.args.slice(-3)).toEqual(['-t', '6.000', path.join(dir, 'slideshow', 'partial.mp4')]);
    expect(fs.readFileSync(path.join(dir, 'slideshow', 'cue-0001.txt'), 'utf8')).toBe('Hi there');
  });

  it('refuses to start without a background image', async () => {
    const { inputs, ctx } = fixture();
    fs.rmSync(inputs.background.path);
    const runner: CommandRunner = vi.fn(async () => ({ stdout: '', stderr: '', exitCode: 0 }));

    await expect(
      new LocalSlideshowRenderer({ output: OutputConfigSchema.parse({}), runner }).render(inputs, ctx),
    ).rejects.toBeInstanceOf(LocalRenderError);
    expect(runner).not.toHaveBeenCalled();
  });

  it('wraps an ffmpeg failure', async () => {
    const { inputs, ctx } = fixture();
    const runner: CommandRunner = async () => ({ stdout: '', stderr: 'Invalid filter', exitCode: 1 });

    const err = await new LocalSlideshowRenderer({ output: OutputConfigSchema.parse({}), runner })
      .render(inputs, ctx)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LocalRenderError);
    if (!(err instanceof LocalRenderError)) return;
    expect(err.message.startsWith('ffmpeg slideshow composition failed: Command failed (exit 1)')).toBe(true);
  });

  it('rejects an empty output file', async () => {
    const { inputs, ctx } = fixture();
    const runner: CommandRunner = async (_bin, args) => {
      fs.writeFileSync(args[args.length - 1] ?? '', '');
      return { stdout: '', stderr: '', exitCode: 0 };
    };

    await expect(
      new LocalSlideshowRenderer({ output: OutputConfigSchema.parse({}), runner }).render(inputs, ctx),
    ).rejects.toThrow('ffmpeg produced an empty video file');
  });
});
