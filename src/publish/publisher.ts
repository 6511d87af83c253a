import type { GitHubAPI } from '../github/api.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';
import { createIssueHandle } from './handle.js';
import type { IssueDraft, IssuePublishStrategy, PublishResult, RemoteIssueHandle } from './types.js';

const ISSUE_URL_NUMBER = /\/issues\/(\d+)\b/;

/**
 * Pull the issue number out of an issue URL printed by the CLI. Returns null
 * when the text holds no `/issues/<n>` segment.
 */
export function parseIssueNumber(text: string): number | null {
  const match = ISSUE_URL_NUMBER.exec(text);
  return match ? Number(match[1]) : null;
}

/**
 * Tries each strategy in order and stops at the first that creates the issue.
 */
export class IssuePublisher {
  constructor(
    private readonly strategies: readonly IssuePublishStrategy[],
    private readonly logger: Logger,
  ) {}

  async publish(draft: IssueDraft): Promise<PublishResult> {
    let last: PublishResult = { status: 'failed', transport: null, reason: 'No publish transport configured' };

    for (const strategy of this.strategies) {
      const result = await strategy.publish(draft);
      if (result.status === 'created') {
        this.logger.event({
          type: 'issue-published',
          title: draft.title,
          transport: result.transport,
          issueNumber: result.handle?.number,
        });
        return result;
      }
      last = result;
      this.logger.debug(`Publish via ${strategy.name} failed; ${this.strategies.length > 1 ? 'trying next transport' : 'no fallback'}`);
    }

    this.logger.event({ type: 'issue-publish-failed', title: draft.title, reason: last.reason }, 'error');
    return last;
  }
}

/**
 * Turn a successful publish into a handle that can take comments. When the
 * transport returned no handle, the issue number is recovered from the
 * printed reference and fetched through the API. Returns null when that is
 * not possible; attachments are then skipped for this run.
 */
export async function resolveIssueHandle(
  result: Extract<PublishResult, { status: 'created' }>,
  api: Pick<GitHubAPI, 'getIssue' | 'addIssueComment'>,
  logger: Logger,
): Promise<RemoteIssueHandle | null> {
  if (result.handle) return result.handle;

  const issueNumber = parseIssueNumber(result.reference);
  if (issueNumber === null) {
    logger.warn(`Could not find an issue number in CLI output: "${result.reference}"`);
    return null;
  }

  try {
    const issue = await api.getIssue(issueNumber);
    return createIssueHandle(api, issue);
  } catch (err) {
    logger.warn(`Could not fetch issue #${issueNumber} after CLI creation: ${errorMessage(err)}`, { issueNumber });
    return null;
  }
}
