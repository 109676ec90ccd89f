/**
 * @module render/local
 * Local slideshow renderer: the background image held for the length of the
 * narration, with one subtitle overlay per cue, composed by ffmpeg.
 *
 * The filter graph goes through `-filter_complex_script` and each cue's text
 * through its own `textfile=`, so nothing from the script is ever quoted on
 * a command line.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { StageContext } from '../context.js';
import type { OutputConfig } from '../config.js';
import type { VideoArtifact } from '../types.js';
import { LocalRenderError, toError } from '../errors.js';
import { ensureDir, fileSize } from '../utils/fs.js';
import { runCommand, runStrict, type CommandRunner } from '../utils/shell.js';
import { VIDEO_FILE, type RenderBackend, type RenderInputs } from './backend.js';

// ---------------------------------------------------------------------------
// Filter graph
// ---------------------------------------------------------------------------

export interface OverlayCue {
  /** Path of the cue text, relative to the ffmpeg working directory. */
  textFile: string;
  start: number;
  end: number;
}

export interface SlideshowFilterOptions {
  width: number;
  height: number;
  cues: OverlayCue[];
  fontPath?: string;
}

/** Escape a value for an ffmpeg filter option. */
export function escapeFilterValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/:/g, '\\:').replace(/,/g, '\\,');
}

/** Filter graph: scale/crop input 0 to the frame, then one drawtext per cue; output label `[v]`. */
export function buildSlideshowFilter(opts: SlideshowFilterOptions): string {
  const { width, height, cues, fontPath } = opts;
  const filters = [
    `scale=${width}:${height}:force_original_aspect_ratio=increase`,
    `crop=${width}:${height}`,
    'setsar=1',
  ];
  const fontSize = Math.round(height / 22);

  for (const cue of cues) {
    const parts = [`textfile=${escapeFilterValue(cue.textFile)}`];
    if (fontPath) parts.push(`fontfile=${escapeFilterValue(fontPath)}`);
    parts.push(
      `fontsize=${fontSize}`,
      'fontcolor=white',
      'box=1',
      'boxcolor=black@0.55',
      'boxborderw=16',
      'x=(w-text_w)/2',
      `y=h-text_h-${Math.round(height / 12)}`,
      `enable='between(t,${cue.start.toFixed(3)},${cue.end.toFixed(3)})'`,
    );
    filters.push(`drawtext=${parts.join(':')}`);
  }

  return `[0:v]${filters.join(',')}[v]`;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export interface LocalRendererOptions {
  output: OutputConfig;
  runner?: CommandRunner;
  ffmpegBin?: string;
}

export class LocalSlideshowRenderer implements RenderBackend {
  readonly kind = 'local' as const;
  private readonly runner: CommandRunner;
  private readonly ffmpegBin: string;

  constructor(private readonly opts: LocalRendererOptions) {
    this.runner = opts.runner ?? runCommand;
    this.ffmpegBin = opts.ffmpegBin ?? 'ffmpeg';
  }

  async render(inputs: RenderInputs, ctx: StageContext): Promise<VideoArtifact> {
    const { audio, background, subtitles } = inputs;

    if ((await fileSize(background.path)) === 0) {
      throw new LocalRenderError(`Background image is missing or empty: ${background.path}`);
    }
    if ((await fileSize(audio.path)) === 0) {
      throw new LocalRenderError(`Audio track is missing or empty: ${audio.path}`);
    }

    const workDir = path.join(ctx.artifactDir, 'slideshow');
    ensureDir(workDir);

    const overlays: OverlayCue[] = [];
    for (const [i, cue] of subtitles.cues.entries()) {
      const textFile = `cue-${String(i).padStart(4, '0')}.txt`;
      await fs.writeFile(path.join(workDir, textFile), cue.text, 'utf8');
      overlays.push({ textFile, start: cue.start, end: cue.end });
    }

    const filterFile = 'filter.txt';
    await fs.writeFile(
      path.join(workDir, filterFile),
      buildSlideshowFilter({
        width: this.opts.output.width,
        height: this.opts.output.height,
        cues: overlays,
        fontPath: this.opts.output.fontPath || undefined,
      }),
      'utf8',
    );

    const target = path.join(ctx.artifactDir, VIDEO_FILE);
    const partial = path.join(workDir, 'partial.mp4');
    ctx.logger.info(`Composing slideshow with ${overlays.length} subtitle overlays`);

    try {
      await runStrict(
        this.runner,
        this.ffmpegBin,
        [
          '-y',
          '-loop', '1',
          '-i', background.path,
          '-i', audio.path,
          '-filter_complex_script', filterFile,
          '-map', '[v]',
          '-map', '1:a',
          '-c:v', 'libx264',
          '-pix_fmt', 'yuv420p',
          '-r', '30',
          '-c:a', 'aac',
          '-t', audio.durationSec.toFixed(3),
          partial,
        ],
        { cwd: workDir, timeoutMs: 900_000, signal: ctx.signal },
      );
    } catch (err) {
      if (ctx.signal.aborted) throw err;
      throw new LocalRenderError(`ffmpeg slideshow composition failed: ${toError(err).message}`, err);
    }

    const bytes = await fileSize(partial);
    if (bytes === 0) {
      throw new LocalRenderError('ffmpeg produced an empty video file');
    }
    await fs.rename(partial, target);

    return {
      articleId: ctx.articleId,
      path: target,
      origin: 'local',
      durationSec: audio.durationSec,
      bytes,
    };
  }
}
