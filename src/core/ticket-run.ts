import { discoverAttachments } from '../attachments/discovery.js';
import type { AttachmentUploader, AttachmentUploadOutcome } from '../attachments/uploader.js';
import { PublishFailedError } from '../errors.js';
import type { GitHubAPI } from '../github/api.js';
import type { TicketReference } from '../input/ticket.js';
import { buildTicketLabels } from '../issues/labels.js';
import type { Logger } from '../logging/logger.js';
import { resolveIssueHandle, type IssuePublisher } from '../publish/publisher.js';
import type { PublishResult } from '../publish/types.js';
import { renderTicketIssue, ticketTitle } from '../render/issue-renderer.js';
import { MISSING_VALUE } from '../render/template.js';
import { DRY_RUN_BANNER, type DryRunOutput } from './output.js';

export type TicketRunOutput =
  | DryRunOutput
  | {
      dryRun: false;
      publisher: Pick<IssuePublisher, 'publish'>;
      api: Pick<GitHubAPI, 'getIssue' | 'addIssueComment'>;
      uploader: AttachmentUploader;
    };

export interface TicketRunOptions {
  /** Ticket issue template text. */
  template: string;
  assignees: readonly string[];
  extraLabels: readonly string[];
  attachmentsDir: string;
  output: TicketRunOutput;
  logger: Logger;
}

export interface TicketRunSummary {
  /** Null for a dry run. */
  published: PublishResult | null;
  attachments: AttachmentUploadOutcome[];
}

/**
 * Open one issue for a ticket and mirror its attachments onto the issue.
 *
 * @throws PublishFailedError when no transport created the issue.
 */
export async function runTicketIssue(ticket: TicketReference, options: TicketRunOptions): Promise<TicketRunSummary> {
  const { logger, output } = options;
  logger.event({ type: 'run-started', mode: 'ticket', dryRun: output.dryRun });

  const title = ticketTitle(ticket);
  const body = renderTicketIssue(ticket, options.template);
  const labels = buildTicketLabels(options.extraLabels);
  const files = await discoverAttachments(options.attachmentsDir, ticket.attachmentHints, logger);

  if (output.dryRun) {
    output.print(DRY_RUN_BANNER);
    output.print('Would create issue:');
    output.print(`  Title: ${title}`);
    output.print(`  Jira Key: ${ticket.key}`);
    output.print(`  Summary: ${ticket.summary || MISSING_VALUE}`);
    output.print(`  Labels: ${labels.join(', ')}`);
    output.print(`  Attachments: ${files.length}`);
    for (const file of files) {
      output.print(`    - ${file}`);
    }
    return { published: null, attachments: [] };
  }

  const published = await output.publisher.publish({ title, body, assignees: options.assignees, labels });
  if (published.status === 'failed') {
    logger.event({ type: 'run-completed', mode: 'ticket', created: 0, failed: 1, skipped: 0 });
    throw new PublishFailedError(`Failed to create issue for ${ticket.key}: ${published.reason}`, title);
  }

  let attachments: AttachmentUploadOutcome[] = [];
  if (files.length > 0) {
    const handle = await resolveIssueHandle(published, output.api, logger);
    if (handle) {
      attachments = await output.uploader.uploadAll(handle, ticket.key, files);
    } else {
      logger.warn(`Skipping ${files.length} attachment(s): the created issue could not be resolved`, {
        ticketKey: ticket.key,
      });
    }
  }

  logger.event({
    type: 'run-completed',
    mode: 'ticket',
    created: 1,
    failed: attachments.filter((outcome) => outcome.status === 'failed').length,
    skipped: 0,
  });
  return { published, attachments };
}
