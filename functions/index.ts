import { createLogger, parseUpdaterEvent, planPageUpdate } from 'jwstascii-helpers';
import type { PagePlan } from 'jwstascii-helpers';

const logger = createLogger('jwstascii-updater');

/**
 * Lambda entry point, invoked daily by the EventBridge schedule.
 */
export async function handler(event: unknown): Promise<PagePlan> {
  const updaterEvent = parseUpdaterEvent(event);
  const plan = planPageUpdate(updaterEvent, new Date());

  logger.info('Planned site update', {
    repoUrl: updaterEvent.repo_url,
    branch: updaterEvent.git_branch,
    newPagePath: plan.newPagePath,
    imageBucket: updaterEvent.s3_bucket
  });

  return plan;
}
