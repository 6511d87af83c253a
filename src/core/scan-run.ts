import type { VulnerabilityRecord } from '../input/vulnerability.js';
import { buildIssueLabels } from '../issues/labels.js';
import type { Logger } from '../logging/logger.js';
import type { IssuePublisher } from '../publish/publisher.js';
import { renderVulnerabilityIssue, vulnerabilityTitle } from '../render/issue-renderer.js';
import { MISSING_VALUE } from '../render/template.js';
import { filterByTargetInstance } from './filter.js';
import { DRY_RUN_BANNER, type DryRunOutput } from './output.js';

export type ScanRunOutput = DryRunOutput | { dryRun: false; publisher: Pick<IssuePublisher, 'publish'> };

export interface ScanRunOptions {
  targetInstance: string;
  /** Vulnerability issue template text. */
  template: string;
  assignees: readonly string[];
  extraLabels: readonly string[];
  output: ScanRunOutput;
  logger: Logger;
}

export interface ScanRunSummary {
  considered: number;
  created: number;
  failed: number;
  skipped: number;
}

/**
 * Create one issue per spreadsheet row that targets the configured instance.
 */
export async function runScanIssues(
  records: readonly VulnerabilityRecord[],
  options: ScanRunOptions,
): Promise<ScanRunSummary> {
  const { logger, output } = options;
  logger.event({ type: 'run-started', mode: 'scan', dryRun: output.dryRun });

  const retained = filterByTargetInstance(records, options.targetInstance);
  const retainedRows = new Set(retained.map((record) => record.rowIndex));
  for (const record of records) {
    if (!retainedRows.has(record.rowIndex)) {
      logger.event(
        {
          type: 'row-skipped',
          rowIndex: record.rowIndex,
          recordId: record.id ?? MISSING_VALUE,
          reason: `instance list does not mention ${options.targetInstance}`,
        },
        'debug',
      );
    }
  }

  const summary: ScanRunSummary = {
    considered: records.length,
    created: 0,
    failed: 0,
    skipped: records.length - retained.length,
  };

  if (output.dryRun) {
    output.print(DRY_RUN_BANNER);
    output.print(`Would create ${retained.length} issues:`);
    for (const record of retained) {
      output.print(`  - ${vulnerabilityTitle(record)}`);
      output.print(`    CVSS Score: ${record.cvssScore ?? MISSING_VALUE}`);
      output.print(`    Finding Type: ${record.findingType ?? MISSING_VALUE}`);
    }
  } else {
    for (const [position, record] of retained.entries()) {
      const title = vulnerabilityTitle(record);
      logger.info(
        `Processing vulnerability ${position + 1}/${retained.length}: ${title} [Label: ${record.label ?? MISSING_VALUE}]`,
        { rowIndex: record.rowIndex },
      );
      const result = await output.publisher.publish({
        title,
        body: renderVulnerabilityIssue(record, options.template),
        assignees: options.assignees,
        labels: buildIssueLabels(record, options.extraLabels),
      });
      if (result.status === 'created') {
        summary.created++;
      } else {
        summary.failed++;
      }
    }
  }

  logger.event({
    type: 'run-completed',
    mode: 'scan',
    created: summary.created,
    failed: summary.failed,
    skipped: summary.skipped,
  });
  return summary;
}
