/**
 * @module stages/generate/background
 * One illustrative background image per article.
 */

import path from 'node:path';
import type { BackgroundArtist } from '../../collaborators.js';
import type { StageContext } from '../../context.js';
import type { ImageConfig } from '../../config.js';
import type { Article, BackgroundImage } from '../../types.js';
import { createImageProvider, type ImageProvider } from '../../providers/image.js';
import { writeFileAtomic } from '../../utils/fs.js';

export function buildBackgroundPrompt(article: Article): string {
  const topics = article.tags.length ? ` Topics: ${article.tags.slice(0, 5).join(', ')}.` : '';
  return (
    `A clean, modern widescreen background illustration for a news video titled "${article.title}".` +
    `${topics} Soft lighting, abstract technology motifs, no text, no letters, no logos.`
  );
}

export class ImageBackgroundArtist implements BackgroundArtist {
  private readonly images: ImageProvider;

  constructor(config: ImageConfig, images?: ImageProvider) {
    this.images = images ?? createImageProvider(config);
  }

  async generate(article: Article, ctx: StageContext): Promise<BackgroundImage> {
    const prompt = buildBackgroundPrompt(article);
    const { image } = await this.images.generate({ prompt }, ctx);

    const target = path.join(ctx.artifactDir, 'background.png');
    await writeFileAtomic(target, image);
    ctx.logger.info(`Background for article ${article.id} written (${image.length} bytes)`);
    return { articleId: article.id, path: target, prompt };
  }
}
