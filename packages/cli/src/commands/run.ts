/**
 * @module commands/run
 * `article2video run [--article <id>]`: one pipeline run with spinner progress.
 */

import * as clack from '@clack/prompts';
import {
  createOrchestrator,
  loadConfig,
  loadDotenv,
  type PipelineRun,
  type StageName,
} from '@article2video/core';

import { ClackLogger } from '../ui/logger.js';
import { intFlag } from '../utils/args.js';

const STAGE_LABEL: Record<StageName, string> = {
  fetch: 'Fetching article',
  script: 'Writing script',
  audio: 'Synthesising narration',
  subtitles: 'Aligning subtitles',
  background: 'Generating background',
  render: 'Rendering video',
  publish: 'Publishing',
};

export function describeRun(run: PipelineRun): string[] {
  const lines = [`run: ${run.runId}`, `status: ${run.status}`];
  if (run.articleId !== undefined) lines.push(`article: ${run.articleId}`);
  if (run.backend) lines.push(`backend: ${run.backend}`);
  for (const s of run.stages) lines.push(`  ${s.stage.padEnd(10)} ${s.status}${s.attempts > 1 ? ` (${s.attempts} attempts)` : ''}`);
  if (run.video) lines.push(`video: ${run.video.path}`);
  if (run.publishedUrl) lines.push(`url: ${run.publishedUrl}`);
  if (run.error) lines.push(`error: [${run.error.stage}] ${run.error.code}: ${run.error.message}`);
  if (run.error?.jobId) lines.push(`remote job: ${run.error.jobId}`);
  if (run.publishError) lines.push(`publish error: ${run.publishError.message}`);
  return lines;
}

/** Returns the process exit code. */
export async function cmdRun(args: string[] = process.argv.slice(3)): Promise<number> {
  const articleId = intFlag(args, '--article');
  loadDotenv();
  const config = loadConfig();
  const orchestrator = createOrchestrator(config, { logger: new ClackLogger(config.debug) });

  clack.intro(`article2video: ${articleId !== undefined ? `article ${articleId}` : 'latest article'}`);
  const spinner = clack.spinner();
  spinner.start('Starting');

  orchestrator
    .on('stage:start', (e) =>
      spinner.message(`${STAGE_LABEL[e.stage]}${e.attempt > 1 ? ` (attempt ${e.attempt})` : ''}`),
    )
    .on('stage:progress', (e) => spinner.message(`${STAGE_LABEL[e.stage]}: ${e.message}`))
    .on('render:poll', (e) => spinner.message(`Rendering video: job ${e.jobId} ${e.status} (poll ${e.poll}/${e.maxPolls})`));

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  try {
    const run = await orchestrator.run({ articleId, signal: controller.signal });
    const failed = run.status === 'failed';
    spinner.stop(failed ? 'Run failed' : 'Run finished', failed ? 1 : 0);
    clack.note(describeRun(run).join('\n'), 'Summary');
    clack.outro(failed ? 'Failed' : 'Done');
    return failed ? 1 : 0;
  } catch (err) {
    spinner.stop('Run not started', 1);
    throw err;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
