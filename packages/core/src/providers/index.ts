export {
  ChatCompletionsProvider,
  createChatProvider,
  type ChatMessage,
  type ChatProvider,
  type ChatReply,
  type ChatRequest,
} from './llm.js';
export {
  ElevenLabsProvider,
  createSpeechProvider,
  elevenLabsBody,
  type SpeechClip,
  type SpeechProvider,
  type SpeechRequest,
} from './tts.js';
export {
  WhisperTranscriptionProvider,
  createTranscriptionProvider,
  type Transcript,
  type TranscriptSegment,
  type TranscriptionProvider,
} from './asr.js';
export {
  OpenAIImageProvider,
  createImageProvider,
  type ImageProvider,
  type ImageRequest,
  type ImageResponse,
} from './image.js';
