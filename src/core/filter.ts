import type { VulnerabilityRecord } from '../input/vulnerability.js';

/**
 * Keep rows whose `uniqueInstances` contains `target`, ignoring case. An
 * empty target keeps every row.
 */
export function filterByTargetInstance(
  records: readonly VulnerabilityRecord[],
  target: string,
): VulnerabilityRecord[] {
  const needle = target.toLowerCase();
  return records.filter((record) => (record.uniqueInstances ?? '').toLowerCase().includes(needle));
}
