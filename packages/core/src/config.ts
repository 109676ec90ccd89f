/**
 * @module config
 * Pipeline configuration schema powered by Zod.
 *
 * The whole configuration is one validated value object handed to component
 * constructors; nothing below the CLI reads `process.env` directly.
 *
 * Load order (later wins):
 *   defaults → .article2video.json → env vars → explicit overrides
 */

import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const LLMConfigSchema = z.object({
  provider: z.enum(['openai', 'openrouter']).default('openai'),
  model: z.string().default('gpt-4o-mini'),
  apiKey: z.string().default(''),
  temperature: z.number().min(0).max(2).default(0.5),
  /** Max tokens for the script reply. */
  maxTokens: z.number().int().positive().default(2000),
});

export const TTSConfigSchema = z.object({
  provider: z.enum(['elevenlabs']).default('elevenlabs'),
  apiKey: z.string().default(''),
  voiceIdA: z.string().default('pNInz6obpgDQGcFmaJgB'),
  voiceIdB: z.string().default('EXAVITQu4vr4xnSDxMaL'),
  model: z.string().default('eleven_multilingual_v2'),
  outputFormat: z.string().default('mp3_44100_128'),
  stability: z.number().min(0).max(1).default(0.5),
  similarity: z.number().min(0).max(1).default(0.75),
});

export const ASRConfigSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().default('whisper-1'),
  apiKey: z.string().default(''),
});

export const ImageConfigSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().default('dall-e-3'),
  apiKey: z.string().default(''),
  size: z.string().default('1792x1024'),
});

export const ArticleSourceConfigSchema = z.object({
  /** esa.io access token. */
  apiToken: z.string().default(''),
  team: z.string().default(''),
  category: z.string().default(''),
  tag: z.string().default(''),
  baseUrl: z.string().url().default('https://api.esa.io/v1'),
});

export const RemoteRenderConfigSchema = z.object({
  /** An empty key selects the local slideshow backend. */
  apiKey: z.string().default(''),
  baseUrl: z.string().url().default('https://api.hedra.com/web-app'),
  characterIdA: z.string().default(''),
  characterIdB: z.string().default(''),
  sceneId: z.string().default(''),
  submitPath: z.string().default('/public/generations'),
  statusPath: z.string().default('/public/generations'),
  pollIntervalSec: z.number().positive().default(5),
  pollTimeoutSec: z.number().positive().default(600),
  /**
   * What happens to a job still running remotely when the local wait ends
   * (timeout or run cancellation): leave it, or request cancellation.
   */
  cancelPolicy: z.enum(['abandon', 'cancel']).default('abandon'),
});

export const OutputConfigSchema = z.object({
  width: z.number().int().positive().default(1920),
  height: z.number().int().positive().default(1080),
  /** Optional font file for subtitle overlays (ffmpeg drawtext). */
  fontPath: z.string().default(''),
});

export const StorageConfigSchema = z.object({
  /** Root of the per-article artifact tree. */
  root: z.string().default('data'),
});

export const PublishConfigSchema = z.object({
  youtube: z
    .object({
      clientId: z.string().default(''),
      clientSecret: z.string().default(''),
      refreshToken: z.string().default(''),
      privacyStatus: z.enum(['public', 'unlisted', 'private']).default('unlisted'),
      categoryId: z.string().default('28'),
    })
    .default({}),
});

export const NotifyConfigSchema = z.object({
  slackWebhookUrl: z.string().default(''),
});

export const RetryConfigSchema = z.object({
  /** Attempts per AI stage call (1 = no retry). */
  maxAttempts: z.number().int().positive().default(3),
  /** Base delay, doubled on each retry. */
  backoffMs: z.number().int().min(0).default(2000),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
});

// ---------------------------------------------------------------------------
// Root schema
// ---------------------------------------------------------------------------

export const PipelineConfigSchema = z.object({
  /** Narration language (BCP-47 or short code). */
  lang: z.string().default('ja'),
  /** Enable verbose debug logging. */
  debug: z.boolean().default(false),
  llm: LLMConfigSchema.default(() => LLMConfigSchema.parse({})),
  tts: TTSConfigSchema.default(() => TTSConfigSchema.parse({})),
  asr: ASRConfigSchema.default(() => ASRConfigSchema.parse({})),
  image: ImageConfigSchema.default(() => ImageConfigSchema.parse({})),
  articles: ArticleSourceConfigSchema.default(() => ArticleSourceConfigSchema.parse({})),
  remote: RemoteRenderConfigSchema.default(() => RemoteRenderConfigSchema.parse({})),
  output: OutputConfigSchema.default(() => OutputConfigSchema.parse({})),
  storage: StorageConfigSchema.default(() => StorageConfigSchema.parse({})),
  publish: PublishConfigSchema.default(() => PublishConfigSchema.parse({})),
  notify: NotifyConfigSchema.default(() => NotifyConfigSchema.parse({})),
  retry: RetryConfigSchema.default(() => RetryConfigSchema.parse({})),
  server: ServerConfigSchema.default(() => ServerConfigSchema.parse({})),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type TTSConfig = z.infer<typeof TTSConfigSchema>;
export type ASRConfig = z.infer<typeof ASRConfigSchema>;
export type ImageConfig = z.infer<typeof ImageConfigSchema>;
export type ArticleSourceConfig = z.infer<typeof ArticleSourceConfigSchema>;
export type RemoteRenderConfig = z.infer<typeof RemoteRenderConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type PublishConfig = z.infer<typeof PublishConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/** Input shape accepted by `loadConfig` / `PipelineConfigSchema.parse`. */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/** Environment snapshot; `process.env` by default. */
export type EnvSource = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Config loader
// ---------------------------------------------------------------------------

export const LOCAL_CONFIG_FILE = '.article2video.json';

export interface LoadConfigOptions {
  env?: EnvSource;
  /** Directory searched for `.article2video.json`. Default: CWD. */
  cwd?: string;
}

/**
 * Load and validate configuration by merging layers:
 *   defaults → .article2video.json → env → overrides
 *
 * Throws a ZodError with detailed messages if the merged config is invalid.
 */
export function loadConfig(
  overrides: Record<string, unknown> = {},
  opts: LoadConfigOptions = {},
): PipelineConfig {
  const env = opts.env ?? process.env;
  const layers: Record<string, unknown>[] = [];

  // Layer 1: project file
  const localPath = path.resolve(opts.cwd ?? process.cwd(), LOCAL_CONFIG_FILE);
  const localJson = readJsonObject(localPath);
  if (localJson) layers.push(localJson);

  // Layer 2: environment variables
  layers.push(envLayer(env));

  // Layer 3: explicit overrides
  if (Object.keys(overrides).length > 0) layers.push(overrides);

  return PipelineConfigSchema.parse(deepMerge({}, ...layers));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readJsonObject(filepath: string): Record<string, unknown> | null {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filepath, 'utf8'));
  } catch {
    return null;
  }
  return isPlainObject(raw) ? raw : null;
}

/** Map recognized env vars to our schema. */
export function envLayer(env: EnvSource): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const llm: Record<string, unknown> = {};
  const tts: Record<string, unknown> = {};
  const asr: Record<string, unknown> = {};
  const image: Record<string, unknown> = {};
  const articles: Record<string, unknown> = {};
  const remote: Record<string, unknown> = {};
  const output: Record<string, unknown> = {};
  const youtube: Record<string, unknown> = {};
  const notify: Record<string, unknown> = {};
  const server: Record<string, unknown> = {};

  if (env.OPENROUTER_API_KEY) {
    llm.apiKey = env.OPENROUTER_API_KEY;
    llm.provider = 'openrouter';
  }
  if (env.OPENAI_API_KEY) {
    llm.apiKey ??= env.OPENAI_API_KEY;
    asr.apiKey = env.OPENAI_API_KEY;
    image.apiKey = env.OPENAI_API_KEY;
  }
  if (env.LLM_MODEL) llm.model = env.LLM_MODEL;

  if (env.ELEVENLABS_API_KEY) tts.apiKey = env.ELEVENLABS_API_KEY;
  if (env.VOICE_ID_A) tts.voiceIdA = env.VOICE_ID_A;
  if (env.VOICE_ID_B) tts.voiceIdB = env.VOICE_ID_B;

  if (env.ESA_API_TOKEN) articles.apiToken = env.ESA_API_TOKEN;
  if (env.ESA_TEAM) articles.team = env.ESA_TEAM;
  if (env.ESA_CATEGORY) articles.category = env.ESA_CATEGORY;
  if (env.ESA_TAG) articles.tag = env.ESA_TAG;

  if (env.AVATAR_API_KEY) remote.apiKey = env.AVATAR_API_KEY;
  if (env.AVATAR_BASE_URL) remote.baseUrl = env.AVATAR_BASE_URL;
  if (env.AVATAR_CHARACTER_A) remote.characterIdA = env.AVATAR_CHARACTER_A;
  if (env.AVATAR_CHARACTER_B) remote.characterIdB = env.AVATAR_CHARACTER_B;
  if (env.AVATAR_SCENE_ID) remote.sceneId = env.AVATAR_SCENE_ID;
  if (env.AVATAR_SUBMIT_PATH) remote.submitPath = env.AVATAR_SUBMIT_PATH;
  if (env.AVATAR_STATUS_PATH) remote.statusPath = env.AVATAR_STATUS_PATH;
  if (env.AVATAR_POLL_INTERVAL_SEC) remote.pollIntervalSec = Number(env.AVATAR_POLL_INTERVAL_SEC);
  if (env.AVATAR_POLL_TIMEOUT_SEC) remote.pollTimeoutSec = Number(env.AVATAR_POLL_TIMEOUT_SEC);
  if (env.AVATAR_CANCEL_POLICY) remote.cancelPolicy = env.AVATAR_CANCEL_POLICY;

  if (env.VIDEO_WIDTH) output.width = Number(env.VIDEO_WIDTH);
  if (env.VIDEO_HEIGHT) output.height = Number(env.VIDEO_HEIGHT);
  if (env.SUBTITLE_FONT_PATH) output.fontPath = env.SUBTITLE_FONT_PATH;

  if (env.YOUTUBE_CLIENT_ID) youtube.clientId = env.YOUTUBE_CLIENT_ID;
  if (env.YOUTUBE_CLIENT_SECRET) youtube.clientSecret = env.YOUTUBE_CLIENT_SECRET;
  if (env.YOUTUBE_REFRESH_TOKEN) youtube.refreshToken = env.YOUTUBE_REFRESH_TOKEN;
  if (env.YOUTUBE_PRIVACY_STATUS) youtube.privacyStatus = env.YOUTUBE_PRIVACY_STATUS;

  if (env.SLACK_WEBHOOK_URL) notify.slackWebhookUrl = env.SLACK_WEBHOOK_URL;
  if (env.PORT) server.port = Number(env.PORT);

  if (env.A2V_DEBUG === '1') out.debug = true;
  if (env.A2V_LANG) out.lang = env.A2V_LANG;
  if (env.A2V_DATA_DIR) out.storage = { root: env.A2V_DATA_DIR };

  if (Object.keys(llm).length) out.llm = llm;
  if (Object.keys(tts).length) out.tts = tts;
  if (Object.keys(asr).length) out.asr = asr;
  if (Object.keys(image).length) out.image = image;
  if (Object.keys(articles).length) out.articles = articles;
  if (Object.keys(remote).length) out.remote = remote;
  if (Object.keys(output).length) out.output = output;
  if (Object.keys(youtube).length) out.publish = { youtube };
  if (Object.keys(notify).length) out.notify = notify;
  if (Object.keys(server).length) out.server = server;

  return out;
}

/** Simple recursive merge for plain objects (arrays are replaced, not merged). */
function deepMerge(
  target: Record<string, unknown>,
  ...sources: Record<string, unknown>[]
): Record<string, unknown> {
  for (const source of sources) {
    for (const key of Object.keys(source)) {
      const sv = source[key];
      const tv = target[key];
      if (isPlainObject(sv) && isPlainObject(tv)) {
        target[key] = deepMerge(tv, sv);
      } else if (isPlainObject(sv)) {
        target[key] = deepMerge({}, sv);
      } else if (sv !== undefined) {
        target[key] = sv;
      }
    }
  }
  return target;
}

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

/** True when YouTube upload credentials are complete. */
export function isPublishConfigured(config: PipelineConfig): boolean {
  const yt = config.publish.youtube;
  return Boolean(yt.clientId && yt.clientSecret && yt.refreshToken);
}
