import { describe, it, expect, vi } from 'vitest';
import { runScanIssues } from '../../src/core/scan-run.js';
import { toVulnerabilityRecord } from '../../src/input/vulnerability.js';
import type { IssueDraft, PublishResult } from '../../src/publish/types.js';
import { makeLogger } from '../helpers/mocks.js';

const records = [
  toVulnerabilityRecord(
    { ID: 'V-1', Name: 'SQL injection', 'CVSS Score': '9.1', 'Unique Instance List': 'brand_landscape_analyzer/api', 'Finding Type': 'Code' },
    0,
  ),
  toVulnerabilityRecord({ ID: 'V-2', Name: 'Weak cipher', 'CVSS Score': '5.3', 'Unique Instance List': 'billing/api' }, 1),
  toVulnerabilityRecord({ ID: 'V-3', Name: 'Open redirect', 'Unique Instance List': 'BRAND_LANDSCAPE_ANALYZER/web' }, 2),
];

const baseOptions = {
  targetInstance: 'brand_landscape_analyzer',
  template: 'ID {vuln_id}, score {cvss_score}',
  assignees: ['alice'],
  extraLabels: ['team:backend'],
};

describe('runScanIssues', () => {
  it('prints the plan in dry-run mode', async () => {
    const lines: string[] = [];

    const summary = await runScanIssues(records, {
      ...baseOptions,
      output: { dryRun: true, print: (line) => lines.push(line) },
      logger: makeLogger(),
    });

    expect(lines).toEqual([
      '\n=== DRY RUN MODE ===',
      'Would create 2 issues:',
      '  - [Security] SQL injection - V-1',
      '    CVSS Score: 9.1',
      '    Finding Type: Code',
      '  - [Security] Open redirect - V-3',
      '    CVSS Score: N/A',
      '    Finding Type: N/A',
    ]);
    expect(summary).toEqual({ considered: 3, created: 0, failed: 0, skipped: 1 });
  });

  it('publishes one issue per retained row with labels and rendered body', async () => {
    const publish = vi.fn(
      async (draft: IssueDraft): Promise<PublishResult> => ({
        status: 'created',
        transport: 'api',
        handle: null,
        reference: draft.title,
      }),
    );

    const summary = await runScanIssues(records, {
      ...baseOptions,
      output: { dryRun: false, publisher: { publish } },
      logger: makeLogger(),
    });

    expect(summary).toEqual({ considered: 3, created: 2, failed: 0, skipped: 1 });
    expect(publish).toHaveBeenNthCalledWith(1, {
      title: '[Security] SQL injection - V-1',
      body: 'ID V-1, score 9.1',
      assignees: ['alice'],
      labels: ['team:backend', 'vulnerability', 'severity:critical'],
    });
    expect(publish).toHaveBeenNthCalledWith(2, {
      title: '[Security] Open redirect - V-3',
      body: 'ID V-3, score N/A',
      assignees: ['alice'],
      labels: ['team:backend', 'vulnerability', 'severity:low'],
    });
  });

  it('logs each row with its sheet label before publishing it', async () => {
    const labelled = [
      toVulnerabilityRecord(
        { ID: 'V-9', Name: 'XXE', Label: 'Q3-triage', 'Unique Instance List': 'brand_landscape_analyzer/api' },
        4,
      ),
      records[2],
    ];
    const logger = makeLogger();

    await runScanIssues(labelled, {
      ...baseOptions,
      output: {
        dryRun: false,
        publisher: { publish: vi.fn(async (): Promise<PublishResult> => ({ status: 'created', transport: 'api', handle: null, reference: 'ok' })) },
      },
      logger,
    });

    expect(logger.info).toHaveBeenCalledWith('Processing vulnerability 1/2: [Security] XXE - V-9 [Label: Q3-triage]', {
      rowIndex: 4,
    });
    expect(logger.info).toHaveBeenCalledWith('Processing vulnerability 2/2: [Security] Open redirect - V-3 [Label: N/A]', {
      rowIndex: 2,
    });
  });

  it('counts failures and keeps going', async () => {
    const publish = vi
      .fn<[IssueDraft], Promise<PublishResult>>()
      .mockResolvedValueOnce({ status: 'failed', transport: 'cli', reason: 'not authenticated' })
      .mockResolvedValueOnce({ status: 'created', transport: 'api', handle: null, reference: 'u' });
    const logger = makeLogger();

    const summary = await runScanIssues(records, {
      ...baseOptions,
      output: { dryRun: false, publisher: { publish } },
      logger,
    });

    expect(summary).toEqual({ considered: 3, created: 1, failed: 1, skipped: 1 });
    expect(logger.event).toHaveBeenLastCalledWith({ type: 'run-completed', mode: 'scan', created: 1, failed: 1, skipped: 1 });
  });

  it('logs skipped rows', async () => {
    const logger = makeLogger();

    await runScanIssues(records, {
      ...baseOptions,
      output: { dryRun: true, print: () => undefined },
      logger,
    });

    expect(logger.event).toHaveBeenCalledWith(
      {
        type: 'row-skipped',
        rowIndex: 1,
        recordId: 'V-2',
        reason: 'instance list does not mention brand_landscape_analyzer',
      },
      'debug',
    );
  });
});
