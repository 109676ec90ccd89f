/**
 * @module stages/generate/script
 * Two-speaker dialogue script from an article, via the configured LLM.
 */

import path from 'node:path';
import type { ScriptGenerator } from '../../collaborators.js';
import type { StageContext } from '../../context.js';
import type { Article, Script, ScriptLine } from '../../types.js';
import { createChatProvider, type ChatProvider } from '../../providers/llm.js';
import type { LLMConfig } from '../../config.js';
import { writeFileAtomic } from '../../utils/fs.js';

const LINE_PATTERN = /^(A|B)\s*[：:]\s*(.+)$/;

/** Longest article body passed to the model, in characters. */
const MAX_BODY_CHARS = 12_000;

/**
 * Parse `A: …` / `B: …` lines (full-width colon accepted). Output without a
 * single parsable line becomes one line spoken by A.
 */
export function parseScript(raw: string): ScriptLine[] {
  const lines: ScriptLine[] = [];
  for (const rawLine of raw.split(/\r?\n/)) {
    const match = LINE_PATTERN.exec(rawLine.trim());
    if (!match) continue;
    const speaker = match[1] === 'B' ? 'B' : 'A';
    const text = (match[2] ?? '').trim();
    if (text) lines.push({ speaker, text });
  }
  if (lines.length === 0 && raw.trim()) {
    return [{ speaker: 'A', text: raw.trim() }];
  }
  return lines;
}

export function formatScript(lines: ScriptLine[]): string {
  return lines.map((line) => `${line.speaker}: ${line.text}`).join('\n') + '\n';
}

export function buildScriptPrompt(article: Article, lang: string): { system: string; user: string } {
  const date = article.publishedAt ? article.publishedAt.slice(0, 10) : 'today';
  return {
    system:
      'You write scripts for short narrated news videos. ' +
      'Two presenters, A and B, explain the article to a general audience.',
    user: [
      `Write a dialogue between A and B presenting the article below (language: ${lang}).`,
      '',
      'Rules:',
      '- Open with a greeting and the date, close with a short summary.',
      '- Cover every topic of the article, with names and figures where given.',
      '- Only speakers A and B. One line per utterance, formatted "A: ..." or "B: ...".',
      '- No headings, stage directions or other text.',
      '',
      `Title: ${article.title}`,
      `Date: ${date}`,
      '',
      article.body.slice(0, MAX_BODY_CHARS),
    ].join('\n'),
  };
}

export class LLMScriptGenerator implements ScriptGenerator {
  private readonly llm: ChatProvider;

  constructor(config: LLMConfig, llm?: ChatProvider) {
    this.llm = llm ?? createChatProvider(config);
  }

  async generate(article: Article, ctx: StageContext): Promise<Script> {
    const prompt = buildScriptPrompt(article, ctx.config.lang);
    const res = await this.llm.complete(
      {
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
      },
      ctx,
    );
    if (res.truncated) {
      ctx.logger.warn(`Script for article ${article.id} hit the token limit; the closing lines may be missing`);
    }

    const lines = parseScript(res.text);
    ctx.logger.info(`Script for article ${article.id}: ${lines.length} lines (${res.model})`);
    await writeFileAtomic(path.join(ctx.artifactDir, 'script.txt'), formatScript(lines));

    return { articleId: article.id, lines, rawText: res.text };
  }
}
