/**
 * @module render/backend
 * The single render contract both backends fulfil.
 */

import type { StageContext } from '../context.js';
import type {
  Article,
  AudioTrack,
  BackgroundImage,
  RenderBackendKind,
  Script,
  SubtitleSet,
  VideoArtifact,
} from '../types.js';

export interface RenderInputs {
  article: Article;
  script: Script;
  audio: AudioTrack;
  subtitles: SubtitleSet;
  background: BackgroundImage;
}

export interface RenderBackend {
  readonly kind: RenderBackendKind;
  render(inputs: RenderInputs, ctx: StageContext): Promise<VideoArtifact>;
}

/** File name of the final video inside the article namespace. */
export const VIDEO_FILE = 'video.mp4';
