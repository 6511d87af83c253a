export type SeverityLevel = 'critical' | 'high' | 'medium' | 'low';

/** Inclusive lower bounds, highest first. */
const THRESHOLDS: ReadonlyArray<[number, SeverityLevel]> = [
  [9.0, 'critical'],
  [7.0, 'high'],
  [4.0, 'medium'],
];

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Read a CVSS score from a spreadsheet cell. Anything that is not a finite
 * number (absent, "N/A", blank, garbage) scores 0.0.
 */
export function parseScore(raw: unknown): number {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : 0;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!NUMERIC.test(trimmed)) return 0;
    const value = Number.parseFloat(trimmed);
    return Number.isFinite(value) ? value : 0;
  }
  return 0;
}

export function classifySeverity(raw: unknown): SeverityLevel {
  const score = parseScore(raw);
  for (const [floor, level] of THRESHOLDS) {
    if (score >= floor) return level;
  }
  return 'low';
}

export function severityLabel(raw: unknown): string {
  return `severity:${classifySeverity(raw)}`;
}
