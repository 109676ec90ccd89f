/**
 * @module commands/doctor
 * `article2video doctor`: checks keys, ffmpeg and the render backend.
 *
 * Prints a JSON summary of checks and hints.
 */

import {
  hasCommand,
  isPublishConfigured,
  loadConfig,
  loadDotenv,
  selectRenderBackend,
  toError,
  type PipelineConfig,
} from '@article2video/core';

export interface DoctorReport {
  ok: boolean;
  checks: Record<string, string | number | boolean>;
  hints: string[];
}

export interface ToolProbe {
  (name: string): Promise<boolean>;
}

export async function collectDoctorReport(
  config: PipelineConfig,
  probe: ToolProbe = (name) => hasCommand(name),
): Promise<DoctorReport> {
  const [ffmpeg, ffprobe] = await Promise.all([probe('ffmpeg'), probe('ffprobe')]);

  let backend = 'local';
  let backendError = '';
  try {
    backend = selectRenderBackend(config.remote).kind;
  } catch (err) {
    backend = 'invalid';
    backendError = toError(err).message;
  }

  const checks = {
    nodeVersion: process.version,
    ffmpeg,
    ffprobe,
    articleSource: Boolean(config.articles.apiToken && config.articles.team),
    llmKey: Boolean(config.llm.apiKey),
    ttsKey: Boolean(config.tts.apiKey),
    asrKey: Boolean(config.asr.apiKey),
    imageKey: Boolean(config.image.apiKey),
    renderBackend: backend,
    publish: isPublishConfigured(config),
    slack: Boolean(config.notify.slackWebhookUrl),
  };

  const hints: string[] = [
    ffmpeg && ffprobe ? '' : 'Install ffmpeg (with ffprobe); narration and the local slideshow need it.',
    checks.articleSource ? '' : 'Set ESA_API_TOKEN and ESA_TEAM to fetch articles.',
    checks.llmKey ? '' : 'Set OPENAI_API_KEY or OPENROUTER_API_KEY for script generation.',
    checks.ttsKey ? '' : 'Set ELEVENLABS_API_KEY for narration.',
    checks.asrKey && checks.imageKey ? '' : 'Set OPENAI_API_KEY for subtitles and background images.',
    backendError,
    checks.publish ? '' : 'Set YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN to publish.',
  ].filter(Boolean);

  const ok =
    ffmpeg &&
    ffprobe &&
    checks.articleSource &&
    checks.llmKey &&
    checks.ttsKey &&
    checks.asrKey &&
    checks.imageKey &&
    backend !== 'invalid';

  return { ok, checks, hints };
}

export async function cmdDoctor(): Promise<number> {
  loadDotenv();
  const report = await collectDoctorReport(loadConfig());
  console.log(JSON.stringify(report, null, 2));
  return report.ok ? 0 : 1;
}
