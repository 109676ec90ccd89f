import { describe, expect, it } from 'vitest';
import { PipelineConfigSchema, type PipelineRun } from '@article2video/core';
import { collectDoctorReport } from '../src/commands/doctor.js';
import { describeRun } from '../src/commands/run.js';
import { arg, hasFlag, intFlag } from '../src/utils/args.js';
import { UsageError } from '../src/utils/errors.js';

describe('args', () => {
  it('reads spaced and inline flag values', () => {
    expect(arg(['--port', '8080'], '--port')).toBe('8080');
    expect(arg(['--host=127.0.0.1'], '--host')).toBe('127.0.0.1');
    expect(arg([], '--host', '0.0.0.0')).toBe('0.0.0.0');
    expect(hasFlag(['--article=5'], '--article')).toBe(true);
  });

  it('parses positive integers only', () => {
    expect(intFlag(['--article', '123'], '--article')).toBe(123);
    expect(intFlag([], '--article')).toBeUndefined();
    expect(() => intFlag(['--article', 'abc'], '--article')).toThrow(UsageError);
    expect(() => intFlag(['--article', '0'], '--article')).toThrow('--article expects a positive integer, got "0"');
  });
});

describe('collectDoctorReport', () => {
  it('flags a partial remote configuration', async () => {
    const config = PipelineConfigSchema.parse({ remote: { apiKey: 'test-key', characterIdA: 'char-a' } });

    const report = await collectDoctorReport(config, async () => true);

    expect(report.ok).toBe(false);
    expect(report.checks.renderBackend).toBe('invalid');
    expect(report.hints).toContain('Remote rendering is enabled but remote.characterIdB is not set');
  });

  it('is ok once every required key and tool is present', async () => {
    const config = PipelineConfigSchema.parse({
      articles: { apiToken: 'test-token', team: 'newsroom' },
      llm: { apiKey: 'test-key' },
      tts: { apiKey: 'test-key' },
      asr: { apiKey: 'test-key' },
      image: { apiKey: 'test-key' },
    });

    const report = await collectDoctorReport(config, async () => true);

    expect(report.ok).toBe(true);
    expect(report.checks.renderBackend).toBe('local');
    expect(report.hints).toEqual([
      'Set YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN to publish.',
    ]);
  });

  it('asks for ffmpeg when it is missing', async () => {
    const report = await collectDoctorReport(PipelineConfigSchema.parse({}), async (name) => name !== 'ffmpeg');
    expect(report.checks.ffmpeg).toBe(false);
    expect(report.hints[0]).toBe('Install ffmpeg (with ffprobe); narration and the local slideshow need it.');
  });
});

describe('describeRun', () => {
  it('lists stages and the failure', () => {
    const run: PipelineRun = {
      runId: 'run-1',
      articleId: 123,
      backend: 'local',
      status: 'failed',
      phase: 'scripting',
      stages: [
        { stage: 'fetch', status: 'completed', attempts: 1 },
        { stage: 'script', status: 'failed', attempts: 3 },
      ],
      startedAt: '2024-05-01T00:00:00Z',
      error: {
        stage: 'script',
        code: 'TRANSIENT_API',
        name: 'TransientAPIError',
        message: 'LLM HTTP 503',
        at: '2024-05-01T00:01:00Z',
      },
    };

    expect(describeRun(run)).toEqual([
      'run: run-1',
      'status: failed',
      'article: 123',
      'backend: local',
      '  fetch      completed',
      '  script     failed (3 attempts)',
      'error: [script] TRANSIENT_API: LLM HTTP 503',
    ]);
  });
});
