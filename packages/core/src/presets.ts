/**
 * @module presets
 * The production wiring: concrete collaborators and render backends built
 * from a validated configuration.
 *
 * Consumers can use it directly or override single collaborators (tests,
 * alternative article sources) through `collaborators`.
 */

import type { PipelineConfig } from './config.js';
import { isPublishConfigured } from './config.js';
import type { Logger } from './context.js';
import type { PipelineEmitter } from './events.js';
import type { RunLock } from './lock.js';
import {
  PipelineOrchestrator,
  type Collaborators,
  type RenderBackendFactory,
} from './orchestrator.js';
import { FileArtifactStore, type ArtifactStore } from './store.js';
import { LocalSlideshowRenderer } from './render/local.js';
import { RemoteAvatarRenderer } from './render/remote.js';
import { HttpAvatarApi } from './render/remote-api.js';
import { EsaArticleSource } from './stages/ingest/esa.js';
import { LLMScriptGenerator } from './stages/generate/script.js';
import { ImageBackgroundArtist } from './stages/generate/background.js';
import { TTSAudioSynthesizer } from './stages/render/tts.js';
import { WhisperSubtitleAligner } from './stages/transcribe/subtitles.js';
import { LLMMetadataGenerator, metadataDefaults } from './stages/publish/metadata.js';
import { YouTubePublisher } from './stages/publish/youtube.js';
import { SlackNotifier } from './stages/notify/slack.js';
import { runCommand, type CommandRunner } from './utils/shell.js';

export interface CreateOrchestratorOptions {
  logger?: Logger;
  emitter?: PipelineEmitter;
  store?: ArtifactStore;
  lock?: RunLock;
  /** Process runner for ffmpeg/ffprobe. */
  runner?: CommandRunner;
  /** Replace individual collaborators. */
  collaborators?: Partial<Collaborators>;
  backends?: RenderBackendFactory;
}

export function defaultCollaborators(config: PipelineConfig, runner: CommandRunner = runCommand): Collaborators {
  const youtube = config.publish.youtube;
  const publishing = isPublishConfigured(config);
  return {
    source: new EsaArticleSource(config.articles),
    scripts: new LLMScriptGenerator(config.llm),
    narrator: new TTSAudioSynthesizer(config.tts, { runner }),
    aligner: new WhisperSubtitleAligner(config.asr),
    artist: new ImageBackgroundArtist(config.image),
    publisher: publishing ? new YouTubePublisher(youtube) : undefined,
    metadata: publishing ? new LLMMetadataGenerator(config.llm, metadataDefaults(config)) : undefined,
    notifier: config.notify.slackWebhookUrl ? new SlackNotifier(config.notify.slackWebhookUrl) : undefined,
  };
}

export function defaultBackends(config: PipelineConfig, runner: CommandRunner = runCommand): RenderBackendFactory {
  return {
    local: () => new LocalSlideshowRenderer({ output: config.output, runner }),
    remote: (settings) => new RemoteAvatarRenderer(new HttpAvatarApi(settings), settings, { output: config.output }),
  };
}

export function createOrchestrator(
  config: PipelineConfig,
  opts: CreateOrchestratorOptions = {},
): PipelineOrchestrator {
  const runner = opts.runner ?? runCommand;
  return new PipelineOrchestrator({
    config,
    collaborators: { ...defaultCollaborators(config, runner), ...opts.collaborators },
    backends: opts.backends ?? defaultBackends(config, runner),
    store: opts.store ?? new FileArtifactStore(config.storage.root),
    lock: opts.lock,
    logger: opts.logger,
    emitter: opts.emitter,
  });
}
