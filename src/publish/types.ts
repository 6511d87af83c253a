/**
 * Everything needed to open one issue.
 */
export interface IssueDraft {
  title: string;
  body: string;
  assignees: readonly string[];
  labels: readonly string[];
}

/**
 * A created issue that can take comments.
 */
export interface RemoteIssueHandle {
  readonly number: number;
  readonly url: string;
  addComment(body: string): Promise<void>;
}

export type PublishTransport = 'api' | 'cli';

export type PublishResult =
  | {
      status: 'created';
      transport: PublishTransport;
      /** Null when the transport cannot report which issue it created. */
      handle: RemoteIssueHandle | null;
      /** Issue URL, or whatever the transport printed on success. */
      reference: string;
    }
  | {
      status: 'failed';
      transport: PublishTransport | null;
      reason: string;
    };

/**
 * One way of creating an issue. Strategies never throw; failures come back
 * as `status: 'failed'`.
 */
export interface IssuePublishStrategy {
  readonly name: PublishTransport;
  publish(draft: IssueDraft): Promise<PublishResult>;
}
