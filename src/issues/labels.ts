import { severityLabel } from '../severity/classifier.js';
import type { VulnerabilityRecord } from '../input/vulnerability.js';

export const VULNERABILITY_LABEL = 'vulnerability';
export const TICKET_LABEL = 'jira-issue';

/**
 * Drop blanks and repeats, keeping the first occurrence of each label.
 */
export function dedupeLabels(labels: ReadonlyArray<string | null | undefined>): string[] {
  const seen = new Set<string>();
  const deduped: string[] = [];
  for (const label of labels) {
    if (!label || seen.has(label)) continue;
    seen.add(label);
    deduped.push(label);
  }
  return deduped;
}

/**
 * Labels for a scan-row issue: caller extras first, then the fixed
 * `vulnerability` marker, then the row's severity label.
 */
export function buildIssueLabels(
  record: Pick<VulnerabilityRecord, 'cvssScore'>,
  extraLabels: readonly string[] = [],
): string[] {
  const severity = severityLabel(record.cvssScore);
  // A caller-supplied severity:* would make two severity labels
  const extras = extraLabels.filter((label) => !label.startsWith('severity:') || label === severity);
  return dedupeLabels([...extras, VULNERABILITY_LABEL, severity]);
}

export function buildTicketLabels(extraLabels: readonly string[] = []): string[] {
  return dedupeLabels([TICKET_LABEL, ...extraLabels]);
}
