/**
 * @module stages/notify/slack
 * Run outcome posted to a Slack incoming webhook.
 */

import type { Notifier } from '../../collaborators.js';
import type { PipelineContext } from '../../context.js';
import type { PipelineRun } from '../../types.js';
import { ensureOk, fetchOrThrow } from '../../utils/http.js';

export function formatRunMessage(run: PipelineRun): { text: string; attachments: Array<{ text: string }> } {
  const subject = run.articleId !== undefined ? `article ${run.articleId}` : 'latest article';
  const headline: Record<PipelineRun['status'], string> = {
    running: `Video pipeline running for ${subject}`,
    completed: `Video published for ${subject}`,
    skipped_publish: `Video rendered for ${subject} (not published)`,
    failed: `Video pipeline failed for ${subject}`,
  };

  const details: string[] = [`run: ${run.runId}`];
  if (run.backend) details.push(`backend: ${run.backend}`);
  if (run.publishedUrl) details.push(`url: ${run.publishedUrl}`);
  if (run.video) details.push(`video: ${run.video.path}`);
  if (run.error) details.push(`error: [${run.error.stage}] ${run.error.code} ${run.error.message}`);
  if (run.error?.jobId) details.push(`job: ${run.error.jobId}`);
  if (run.publishError) details.push(`publish error: ${run.publishError.message}`);

  return { text: headline[run.status], attachments: [{ text: details.join('\n') }] };
}

export class SlackNotifier implements Notifier {
  constructor(private readonly webhookUrl: string) { }

  async notify(run: PipelineRun, ctx: PipelineContext): Promise<void> {
    const res = await fetchOrThrow('Slack', this.webhookUrl, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(formatRunMessage(run)),
      signal: AbortSignal.timeout(10_000),
    });
    await ensureOk('Slack', res);
    ctx.logger.debug(`Slack notified for run ${run.runId}`);
  }
}
