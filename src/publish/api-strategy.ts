import type { GitHubAPI } from '../github/api.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';
import { createIssueHandle } from './handle.js';
import type { IssuePublishStrategy } from './types.js';

/**
 * Create issues through the Octokit client. Returns a handle on success.
 */
export function createApiPublishStrategy(api: GitHubAPI, logger: Logger): IssuePublishStrategy {
  return {
    name: 'api',
    async publish(draft) {
      try {
        const issue = await api.createIssue(draft);
        logger.info(`Created issue via API: ${draft.title} (#${issue.number})`, { issueNumber: issue.number });
        return { status: 'created', transport: 'api', handle: createIssueHandle(api, issue), reference: issue.url };
      } catch (err) {
        const reason = errorMessage(err);
        logger.warn(`Failed to create issue via API: ${reason}`);
        return { status: 'failed', transport: 'api', reason };
      }
    },
  };
}
