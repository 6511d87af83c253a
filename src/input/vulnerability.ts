/**
 * Record field → accepted spreadsheet headers (after whitespace trimming).
 * The first header is the canonical one; later entries are older spellings.
 */
export const FIELD_HEADERS = [
  ['scanType', ['Scan Type', 'ScanType']],
  ['id', ['ID']],
  ['name', ['Name']],
  ['description', ['Description']],
  ['recommendation', ['Recommendation']],
  ['cveCwe', ['CVE/CWE']],
  ['cvssScore', ['CVSS Score']],
  ['totalCount', ['Total Count']],
  ['uniqueInstances', ['Unique Instance List']],
  ['teams', ['Teams']],
  ['findingType', ['Finding Type']],
  ['compliance', ['Compliance Framework(s)']],
  ['exploitAvailable', ['Exploit Available']],
  ['exploitRating', ['Exploit Rating']],
  ['easeOfAttack', ['Mandiant Ease of Attack']],
  ['exploitConsequence', ['Exploit Consequence']],
  ['mitigation', ['Mitigation']],
  ['zeroDay', ['Zero Day']],
  ['epssScore', ['EPSS Score']],
  ['cisaKev', ['CISA KEV Vulnerability']],
  ['label', ['Label']],
] as const;

export type VulnerabilityField = (typeof FIELD_HEADERS)[number][0];

/**
 * One row of scan data. Cells that are empty in the sheet are undefined.
 */
export type VulnerabilityRecord = {
  readonly rowIndex: number;
} & {
  readonly [K in VulnerabilityField]?: string;
};

export type RawRow = Readonly<Record<string, string | undefined>>;

/**
 * Build a frozen record from a header→cell map. `rowIndex` is the
 * zero-based position of the row below the header; blank rows that the
 * loader skips still count.
 */
export function toVulnerabilityRecord(row: RawRow, rowIndex: number): VulnerabilityRecord {
  const record: { rowIndex: number } & { [K in VulnerabilityField]?: string } = { rowIndex };

  for (const [field, headers] of FIELD_HEADERS) {
    for (const header of headers) {
      const value = row[header]?.trim();
      if (value) {
        record[field] = value;
        break;
      }
    }
  }

  return Object.freeze(record);
}
