/**
 * @module store
 * Per-article artifact cache.
 *
 * The orchestrator only sees the narrow {@link ArtifactCache} interface
 * (`has` / `get` / `put`, keyed by article id). Two implementations:
 *
 *   - {@link FileArtifactStore}: one namespace directory per article, one JSON
 *     record per artifact kind next to the binary it references. Records are
 *     written atomically and validated on read; a record whose file vanished
 *     is a miss.
 *   - {@link MemoryArtifactStore}: process-local maps, for tests and embedding.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type {
  AudioTrack,
  BackgroundImage,
  PipelineRun,
  PublishRecord,
  Script,
  SubtitleSet,
  VideoArtifact,
  VideoMetadata,
} from './types.js';
import { readJsonSafe, writeJsonAtomic } from './utils/fs.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface ArtifactCache<T> {
  has(key: string): Promise<boolean>;
  get(key: string): Promise<T | undefined>;
  put(key: string, value: T): Promise<void>;
}

export interface ArtifactRecords {
  script: Script;
  audio: AudioTrack;
  subtitles: SubtitleSet;
  background: BackgroundImage;
  video: VideoArtifact;
  metadata: VideoMetadata;
  publish: PublishRecord;
}

export type ArtifactKind = keyof ArtifactRecords;

export interface ArtifactStore {
  cache<K extends ArtifactKind>(kind: K): ArtifactCache<ArtifactRecords[K]>;
  /** Namespace directory of one article; not created until something is written. */
  dirFor(articleId: number): string;
  /** Persist the summary of a finished run. */
  saveRun(run: PipelineRun): Promise<void>;
}

// ---------------------------------------------------------------------------
// Record schemas
// ---------------------------------------------------------------------------

const speaker = z.enum(['A', 'B']);

const ScriptSchema = z.object({
  articleId: z.number().int(),
  lines: z.array(z.object({ speaker, text: z.string() })).min(1),
  rawText: z.string(),
});

const AudioTrackSchema = z.object({
  articleId: z.number().int(),
  path: z.string(),
  durationSec: z.number().nonnegative(),
  lines: z.array(
    z.object({
      index: z.number().int(),
      speaker,
      text: z.string(),
      start: z.number(),
      end: z.number(),
    }),
  ),
});

const SubtitleSetSchema = z.object({
  articleId: z.number().int(),
  path: z.string(),
  cues: z.array(z.object({ text: z.string(), start: z.number(), end: z.number() })),
});

const BackgroundImageSchema = z.object({
  articleId: z.number().int(),
  path: z.string(),
  prompt: z.string(),
});

const VideoArtifactSchema = z.object({
  articleId: z.number().int(),
  path: z.string(),
  origin: z.enum(['remote', 'local']),
  durationSec: z.number().optional(),
  bytes: z.number().int().positive(),
  jobId: z.string().optional(),
});

const VideoMetadataSchema = z.object({
  articleId: z.number().int(),
  title: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()),
  categoryId: z.string(),
  privacyStatus: z.enum(['public', 'unlisted', 'private']),
  language: z.string(),
});

const PublishRecordSchema = z.object({
  articleId: z.number().int(),
  url: z.string(),
  publishedAt: z.string(),
});

const RECORD_SCHEMAS: { [K in ArtifactKind]: z.ZodType<ArtifactRecords[K]> } = {
  script: ScriptSchema,
  audio: AudioTrackSchema,
  subtitles: SubtitleSetSchema,
  background: BackgroundImageSchema,
  video: VideoArtifactSchema,
  metadata: VideoMetadataSchema,
  publish: PublishRecordSchema,
};

/** File a record points at, when it points at one. */
function referencedPath(value: ArtifactRecords[ArtifactKind]): string | undefined {
  return 'path' in value ? value.path : undefined;
}

// ---------------------------------------------------------------------------
// File-backed store
// ---------------------------------------------------------------------------

export class FileArtifactStore implements ArtifactStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  dirFor(articleId: number): string {
    return path.join(this.root, 'articles', String(articleId));
  }

  cache<K extends ArtifactKind>(kind: K): ArtifactCache<ArtifactRecords[K]> {
    const schema = RECORD_SCHEMAS[kind];
    const recordPath = (key: string) => path.join(this.root, 'articles', key, `${kind}.json`);

    const get = async (key: string): Promise<ArtifactRecords[K] | undefined> => {
      const raw = await readJsonSafe(recordPath(key));
      if (raw === null) return undefined;
      const parsed = schema.safeParse(raw);
      if (!parsed.success) return undefined;
      const file = referencedPath(parsed.data);
      if (file !== undefined && !fs.existsSync(file)) return undefined;
      return parsed.data;
    };

    return {
      get,
      has: async (key) => (await get(key)) !== undefined,
      put: (key, value) => writeJsonAtomic(recordPath(key), value),
    };
  }

  saveRun(run: PipelineRun): Promise<void> {
    if (run.articleId === undefined) return Promise.resolve();
    return writeJsonAtomic(path.join(this.dirFor(run.articleId), 'run.json'), run);
  }
}

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

export class MemoryArtifactStore implements ArtifactStore {
  private readonly records = new Map<string, unknown>();
  readonly runs: PipelineRun[] = [];

  constructor(private readonly root: string = path.join(process.cwd(), 'data')) { }

  dirFor(articleId: number): string {
    return path.join(this.root, 'articles', String(articleId));
  }

  cache<K extends ArtifactKind>(kind: K): ArtifactCache<ArtifactRecords[K]> {
    const schema = RECORD_SCHEMAS[kind];
    const slot = (key: string) => `${kind}:${key}`;
    const get = async (key: string): Promise<ArtifactRecords[K] | undefined> => {
      const parsed = schema.safeParse(this.records.get(slot(key)));
      return parsed.success ? parsed.data : undefined;
    };
    return {
      get,
      has: async (key) => (await get(key)) !== undefined,
      put: async (key, value) => {
        this.records.set(slot(key), structuredClone(value));
      },
    };
  }

  async saveRun(run: PipelineRun): Promise<void> {
    this.runs.push(structuredClone(run));
  }

  /** Number of stored records, all kinds. */
  get size(): number {
    return this.records.size;
  }
}
