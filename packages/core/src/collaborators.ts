/**
 * @module collaborators
 * Contracts of the external services the orchestrator drives. Concrete
 * implementations live under `stages/`; tests substitute stubs.
 */

import type { PipelineContext, StageContext } from './context.js';
import type {
  Article,
  AudioTrack,
  BackgroundImage,
  PipelineRun,
  Script,
  SubtitleSet,
  VideoArtifact,
  VideoMetadata,
} from './types.js';

export interface ArticleSource {
  /** Fetch one article, or the latest when `articleId` is undefined. Throws NotFoundError. */
  fetch(articleId: number | undefined, ctx: PipelineContext): Promise<Article>;
}

export interface ScriptGenerator {
  generate(article: Article, ctx: StageContext): Promise<Script>;
}

export interface AudioSynthesizer {
  synthesize(script: Script, ctx: StageContext): Promise<AudioTrack>;
}

export interface SubtitleAligner {
  align(audio: AudioTrack, script: Script, ctx: StageContext): Promise<SubtitleSet>;
}

export interface BackgroundArtist {
  generate(article: Article, ctx: StageContext): Promise<BackgroundImage>;
}

export interface MetadataGenerator {
  /** Upload title, description and tags for the finished video. */
  generate(article: Article, script: Script, ctx: StageContext): Promise<VideoMetadata>;
}

export interface Publisher {
  /** Upload the video and return its public URL. Throws PublishError. */
  publish(video: VideoArtifact, metadata: VideoMetadata, ctx: StageContext): Promise<string>;
}

export interface Notifier {
  notify(run: PipelineRun, ctx: PipelineContext): Promise<void>;
}
