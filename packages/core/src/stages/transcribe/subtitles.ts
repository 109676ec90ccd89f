/**
 * @module stages/transcribe/subtitles
 * Subtitle alignment: Whisper segments of the mixed track, normalised so cues
 * are time-ordered, non-overlapping and inside `[0, audio.durationSec]`.
 * Without usable segments, cues come from the per-line timing of the track.
 */

import path from 'node:path';
import type { SubtitleAligner } from '../../collaborators.js';
import type { StageContext } from '../../context.js';
import type { ASRConfig } from '../../config.js';
import type { AudioTrack, Cue, Script, SubtitleSet } from '../../types.js';
import { createTranscriptionProvider, type TranscriptionProvider } from '../../providers/asr.js';
import { writeFileAtomic } from '../../utils/fs.js';

/** Shortest cue kept after clamping, in seconds. */
const MIN_CUE_SEC = 0.05;

export function normalizeCues(segments: readonly Cue[], durationSec: number): Cue[] {
  const limit = Math.max(0, durationSec);
  const sorted = segments
    .map((s) => ({ text: s.text.replace(/\s+/g, ' ').trim(), start: s.start, end: s.end }))
    .filter((s) => s.text && Number.isFinite(s.start) && Number.isFinite(s.end))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const cues: Cue[] = [];
  let cursor = 0;
  for (const seg of sorted) {
    const start = Math.min(Math.max(seg.start, cursor, 0), limit);
    const end = Math.min(seg.end, limit);
    if (end - start < MIN_CUE_SEC) continue;
    cues.push({ text: seg.text, start, end });
    cursor = end;
  }
  return cues;
}

/** Cues taken one per script line from the track's own timing. */
export function cuesFromTimings(audio: AudioTrack): Cue[] {
  return normalizeCues(
    audio.lines.map((line) => ({ text: line.text, start: line.start, end: line.end })),
    audio.durationSec,
  );
}

function srtTimestamp(seconds: number): string {
  const totalMs = Math.round(seconds * 1000);
  const ms = totalMs % 1000;
  const totalSec = Math.floor(totalMs / 1000);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(Math.floor(totalSec / 3600))}:${pad(Math.floor(totalSec / 60) % 60)}:${pad(totalSec % 60)},${pad(ms, 3)}`;
}

export function toSrt(cues: readonly Cue[]): string {
  return cues
    .map((cue, i) => `${i + 1}\n${srtTimestamp(cue.start)} --> ${srtTimestamp(cue.end)}\n${cue.text}\n`)
    .join('\n');
}

export class WhisperSubtitleAligner implements SubtitleAligner {
  private readonly asr: TranscriptionProvider;

  constructor(config: ASRConfig, asr?: TranscriptionProvider) {
    this.asr = asr ?? createTranscriptionProvider(config);
  }

  async align(audio: AudioTrack, script: Script, ctx: StageContext): Promise<SubtitleSet> {
    const transcript = await this.asr.transcribe(audio.path, ctx.config.lang, ctx);

    let cues = normalizeCues(transcript.segments, audio.durationSec);
    if (cues.length === 0) {
      ctx.logger.warn(
        `No usable transcription segments for article ${script.articleId}; using script line timing`,
      );
      cues = cuesFromTimings(audio);
    }

    const target = path.join(ctx.artifactDir, 'subtitles.srt');
    await writeFileAtomic(target, toSrt(cues));
    return { articleId: script.articleId, path: target, cues };
  }
}
