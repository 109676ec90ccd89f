/**
 * @module stages
 * Concrete collaborator implementations, grouped by what they do.
 */

export { EsaArticleSource, jstDay, pickPost, postDay, toArticle, type PostPick } from './ingest/esa.js';
export { LLMScriptGenerator, parseScript, formatScript, buildScriptPrompt } from './generate/script.js';
export { ImageBackgroundArtist, buildBackgroundPrompt } from './generate/background.js';
export { TTSAudioSynthesizer, lineTimings, probeDuration, type TTSSynthesizerOptions } from './render/tts.js';
export { WhisperSubtitleAligner, normalizeCues, cuesFromTimings, toSrt } from './transcribe/subtitles.js';
export { YouTubePublisher, watchUrl } from './publish/youtube.js';
export {
  LLMMetadataGenerator,
  TemplateMetadataGenerator,
  buildMetadataPrompt,
  buildVideoMetadata,
  metadataDefaults,
  parseMetadataReply,
  type MetadataDefaults,
  type MetadataReply,
} from './publish/metadata.js';
export { SlackNotifier, formatRunMessage } from './notify/slack.js';
