export const MISSING_VALUE = 'N/A';

export type TemplateFields = Readonly<Record<string, string>>;

/**
 * Normalize a cell or input value for substitution. Blank values become
 * `N/A`; everything else passes through untouched (templates are trusted,
 * so markdown is not escaped).
 */
export function sanitizeValue(value: unknown): string {
  if (value === undefined || value === null || value === '') return MISSING_VALUE;
  if (typeof value === 'number') return Number.isNaN(value) ? MISSING_VALUE : String(value);
  if (typeof value === 'string') return value;
  return String(value);
}

const PLACEHOLDER = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Substitute `{name}` placeholders. Names missing from `fields` render as
 * `N/A`; `{{` and `}}` produce literal braces.
 */
export function renderTemplate(template: string, fields: TemplateFields): string {
  return template.replace(PLACEHOLDER, (match: string, name: string | undefined) => {
    if (name === undefined) return match[0];
    return Object.hasOwn(fields, name) ? fields[name] : MISSING_VALUE;
  });
}
