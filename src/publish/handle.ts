import type { GitHubAPI, IssueRef } from '../github/api.js';
import type { RemoteIssueHandle } from './types.js';

export function createIssueHandle(api: Pick<GitHubAPI, 'addIssueComment'>, issue: IssueRef): RemoteIssueHandle {
  return {
    number: issue.number,
    url: issue.url,
    async addComment(body: string): Promise<void> {
      await api.addIssueComment(issue.number, body);
    },
  };
}
