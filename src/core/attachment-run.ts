import { discoverAttachments } from '../attachments/discovery.js';
import type { AttachmentUploader, AttachmentUploadOutcome } from '../attachments/uploader.js';
import type { GitHubAPI } from '../github/api.js';
import type { TicketReference } from '../input/ticket.js';
import type { Logger } from '../logging/logger.js';
import { createIssueHandle } from '../publish/handle.js';
import { DRY_RUN_BANNER, type DryRunOutput } from './output.js';

export type AttachmentRunOutput =
  | DryRunOutput
  | { dryRun: false; api: Pick<GitHubAPI, 'getIssue' | 'addIssueComment'>; uploader: AttachmentUploader };

export interface AttachmentRunOptions {
  issueNumber: number;
  attachmentsDir: string;
  output: AttachmentRunOutput;
  logger: Logger;
}

/**
 * Upload the files in the attachments directory to an issue that already
 * exists, under the ticket's folder on the attachments branch.
 */
export async function runAttachmentUpload(
  ticket: TicketReference,
  options: AttachmentRunOptions,
): Promise<AttachmentUploadOutcome[]> {
  const { logger, output, issueNumber } = options;
  logger.event({ type: 'run-started', mode: 'attachments', dryRun: output.dryRun });

  const files = await discoverAttachments(options.attachmentsDir, ticket.attachmentHints, logger);
  if (files.length === 0) {
    logger.info(`No files in ${options.attachmentsDir}; nothing to do.`, { issueNumber, ticketKey: ticket.key });
    logger.event({ type: 'run-completed', mode: 'attachments', created: 0, failed: 0, skipped: 0 });
    return [];
  }

  if (output.dryRun) {
    output.print(DRY_RUN_BANNER);
    output.print(`Would upload ${files.length} file(s) to issue #${issueNumber} for ${ticket.key}:`);
    for (const file of files) {
      output.print(`  - ${file}`);
    }
    return [];
  }

  const issue = await output.api.getIssue(issueNumber);
  const handle = createIssueHandle(output.api, issue);
  const outcomes = await output.uploader.uploadAll(handle, ticket.key, files);

  const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
  logger.event({
    type: 'run-completed',
    mode: 'attachments',
    created: outcomes.length - failed,
    failed,
    skipped: 0,
  });
  return outcomes;
}
