/**
 * @module stages/render/tts
 * Narration: synthesise each script line with the speaker's voice, measure
 * each clip, then concatenate via ffmpeg into one track with per-line timing.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { AudioSynthesizer } from '../../collaborators.js';
import type { StageContext } from '../../context.js';
import type { TTSConfig } from '../../config.js';
import type { AudioTrack, LineTiming, Script, ScriptLine } from '../../types.js';
import { createSpeechProvider, type SpeechProvider } from '../../providers/tts.js';
import { ensureDir } from '../../utils/fs.js';
import { runCommand, runStrict, type CommandRunner } from '../../utils/shell.js';

/** Cumulative, gap-free timing of consecutive clips. */
export function lineTimings(lines: ScriptLine[], durations: number[]): LineTiming[] {
  let cursor = 0;
  return lines.map((line, index) => {
    const start = cursor;
    cursor += Math.max(0, durations[index] ?? 0);
    return { index, speaker: line.speaker, text: line.text, start, end: cursor };
  });
}

/** Duration in seconds as reported by ffprobe. */
export async function probeDuration(
  runner: CommandRunner,
  file: string,
  signal: AbortSignal,
  ffprobeBin = 'ffprobe',
): Promise<number> {
  const result = await runStrict(
    runner,
    ffprobeBin,
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', file],
    { timeoutMs: 30_000, signal },
  );
  const seconds = Number.parseFloat(result.stdout.trim());
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`ffprobe reported no duration for ${path.basename(file)}`);
  }
  return seconds;
}

export interface TTSSynthesizerOptions {
  tts?: SpeechProvider;
  runner?: CommandRunner;
  ffmpegBin?: string;
  ffprobeBin?: string;
}

export class TTSAudioSynthesizer implements AudioSynthesizer {
  private readonly tts: SpeechProvider;
  private readonly runner: CommandRunner;
  private readonly ffmpegBin: string;
  private readonly ffprobeBin: string;

  constructor(
    private readonly config: TTSConfig,
    opts: TTSSynthesizerOptions = {},
  ) {
    this.tts = opts.tts ?? createSpeechProvider(config);
    this.runner = opts.runner ?? runCommand;
    this.ffmpegBin = opts.ffmpegBin ?? 'ffmpeg';
    this.ffprobeBin = opts.ffprobeBin ?? 'ffprobe';
  }

  async synthesize(script: Script, ctx: StageContext): Promise<AudioTrack> {
    if (script.lines.length === 0) {
      throw new Error(`Script for article ${script.articleId} has no lines to narrate`);
    }

    const clipsDir = path.join(ctx.artifactDir, 'audio-clips');
    ensureDir(clipsDir);
    const clipNames: string[] = [];
    const durations: number[] = [];

    for (const [i, line] of script.lines.entries()) {
      const voiceId = line.speaker === 'A' ? this.config.voiceIdA : this.config.voiceIdB;
      ctx.emitter.emit('stage:progress', {
        runId: ctx.runId,
        stage: 'audio',
        message: `TTS line ${i + 1}/${script.lines.length} (${line.speaker})`,
        percent: Math.round(((i + 1) / script.lines.length) * 100),
      });

      const result = await this.tts.synthesize(
        {
          text: line.text,
          voiceId,
          previousText: script.lines[i - 1]?.text,
          nextText: script.lines[i + 1]?.text,
        },
        ctx,
      );
      const clipName = `line-${String(i).padStart(4, '0')}.mp3`;
      const clipPath = path.join(clipsDir, clipName);
      await fs.writeFile(clipPath, result.audio);
      clipNames.push(clipName);
      durations.push(await probeDuration(this.runner, clipPath, ctx.signal, this.ffprobeBin));
    }

    ctx.emitter.emit('stage:progress', {
      runId: ctx.runId,
      stage: 'audio',
      message: 'Concatenating audio with ffmpeg…',
    });

    await fs.writeFile(
      path.join(clipsDir, 'concat.txt'),
      clipNames.map((name) => `file '${name}'`).join('\n') + '\n',
    );
    const partial = path.join(clipsDir, 'partial.mp3');
    await runStrict(
      this.runner,
      this.ffmpegBin,
      ['-y', '-f', 'concat', '-safe', '0', '-i', 'concat.txt', '-c', 'copy', partial],
      { cwd: clipsDir, timeoutMs: 300_000, signal: ctx.signal },
    );

    const lines = lineTimings(script.lines, durations);
    const summed = lines.length ? lines[lines.length - 1].end : 0;
    const probed = await probeDuration(this.runner, partial, ctx.signal, this.ffprobeBin);
    const target = path.join(ctx.artifactDir, 'audio.mp3');
    await fs.rename(partial, target);

    return {
      articleId: script.articleId,
      path: target,
      // Per-line timing must stay inside the track.
      durationSec: Math.max(probed, summed),
      lines,
    };
  }
}
