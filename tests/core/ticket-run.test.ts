import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AttachmentUploader } from '../../src/attachments/uploader.js';
import { runTicketIssue } from '../../src/core/ticket-run.js';
import { PublishFailedError } from '../../src/errors.js';
import { toTicketReference } from '../../src/input/ticket.js';
import type { IssueDraft, PublishResult } from '../../src/publish/types.js';
import { makeLogger, makeTransport } from '../helpers/mocks.js';

describe('runTicketIssue', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ticket-'));
    await writeFile(join(dir, 'trace.log'), 'stack');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function makeApi() {
    return {
      getIssue: vi.fn(async (n: number) => ({ number: n, url: `https://github.com/acme/widgets/issues/${n}`, title: 'T' })),
      addIssueComment: vi.fn(async () => 'https://github.com/c/1'),
    };
  }

  function makeUploader() {
    return new AttachmentUploader([makeTransport('octokit')], makeLogger(), {
      repository: 'acme/widgets',
      branch: 'issue-attachments',
      rawBaseUrl: 'https://raw.githubusercontent.com',
      confirmDelayMs: 0,
    });
  }

  it('prints the plan in dry-run mode, even without a summary', async () => {
    const lines: string[] = [];

    const summary = await runTicketIssue(toTicketReference({ key: 'SEC-42', summary: '' }), {
      template: '{jira_issue_key}',
      assignees: [],
      extraLabels: ['bug'],
      attachmentsDir: dir,
      output: { dryRun: true, print: (line) => lines.push(line) },
      logger: makeLogger(),
    });

    expect(summary).toEqual({ published: null, attachments: [] });
    expect(lines).toEqual([
      '\n=== DRY RUN MODE ===',
      'Would create issue:',
      '  Title: [Security] SEC-42',
      '  Jira Key: SEC-42',
      '  Summary: N/A',
      '  Labels: jira-issue, bug',
      '  Attachments: 1',
      `    - ${join(dir, 'trace.log')}`,
    ]);
  });

  it('publishes, recovers the CLI-created issue and uploads attachments', async () => {
    const publish = vi.fn(
      async (_draft: IssueDraft): Promise<PublishResult> => ({
        status: 'created',
        transport: 'cli',
        handle: null,
        reference: 'https://github.com/acme/widgets/issues/77',
      }),
    );
    const api = makeApi();

    const summary = await runTicketIssue(toTicketReference({ key: 'SEC-42', summary: 'Crash on save' }), {
      template: 'Key {jira_issue_key}: {jira_description}',
      assignees: ['alice'],
      extraLabels: ['bug'],
      attachmentsDir: dir,
      output: { dryRun: false, publisher: { publish }, api, uploader: makeUploader() },
      logger: makeLogger(),
    });

    expect(publish).toHaveBeenCalledWith({
      title: '[Security] Crash on save - SEC-42',
      body: 'Key SEC-42: No description provided',
      assignees: ['alice'],
      labels: ['jira-issue', 'bug'],
    });
    expect(api.getIssue).toHaveBeenCalledWith(77);
    expect(summary.attachments).toEqual([
      {
        status: 'uploaded',
        rawUrl: 'https://raw.githubusercontent.com/acme/widgets/issue-attachments/attachments/SEC-42/trace.log',
        repoPath: 'attachments/SEC-42/trace.log',
        transport: 'octokit',
      },
    ]);
    expect(api.addIssueComment).toHaveBeenCalledWith(77, expect.stringContaining('![trace.log]('));
  });

  it('skips attachments when the created issue cannot be resolved', async () => {
    const publish = vi.fn(
      async (): Promise<PublishResult> => ({ status: 'created', transport: 'cli', handle: null, reference: 'ok' }),
    );
    const logger = makeLogger();

    const summary = await runTicketIssue(toTicketReference({ key: 'SEC-42' }), {
      template: '',
      assignees: [],
      extraLabels: [],
      attachmentsDir: dir,
      output: { dryRun: false, publisher: { publish }, api: makeApi(), uploader: makeUploader() },
      logger,
    });

    expect(summary.attachments).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping 1 attachment(s): the created issue could not be resolved',
      { ticketKey: 'SEC-42' },
    );
  });

  it('throws PublishFailedError when no transport created the issue', async () => {
    const publish = vi.fn(
      async (): Promise<PublishResult> => ({ status: 'failed', transport: 'cli', reason: 'not authenticated' }),
    );

    await expect(
      runTicketIssue(toTicketReference({ key: 'SEC-42' }), {
        template: '',
        assignees: [],
        extraLabels: [],
        attachmentsDir: dir,
        output: { dryRun: false, publisher: { publish }, api: makeApi(), uploader: makeUploader() },
        logger: makeLogger(),
      }),
    ).rejects.toThrow(new PublishFailedError('Failed to create issue for SEC-42: not authenticated', '[Security] SEC-42'));
  });
});
