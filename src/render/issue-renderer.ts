import type { VulnerabilityRecord } from '../input/vulnerability.js';
import type { TicketReference } from '../input/ticket.js';
import { renderTemplate, sanitizeValue, type TemplateFields } from './template.js';
import { TemplateStore } from './template-store.js';

export const VULNERABILITY_TEMPLATE = 'vulnerability-issue';
export const TICKET_TEMPLATE = 'ticket-issue';

/**
 * Used only when no `ticket-issue.md` exists in the template directory.
 */
export const FALLBACK_TICKET_TEMPLATE = `## Jira Bug Report
- **Issue Key:** {jira_issue_key}
- **Summary:** {jira_summary}

## Description / Reproduction steps
{jira_description}

## Attachments / Images
Any screenshots or logs attached to the ticket are posted as comments on this issue.
Inspect them for stack traces, timestamps, configuration snippets or UI clues.

## Goal
Reproduce the bug using the steps above and make a minimal, tested fix.

## Acceptance criteria
- The bug is reproduced, or a comment explains why it could not be.
- Changes are limited to the components involved.
- Tests cover the fix and pass in CI.
- The PR references {jira_issue_key} and describes how to validate the change.
`;

export function createTemplateStore(dir?: string): TemplateStore {
  return new TemplateStore(dir, { [TICKET_TEMPLATE]: FALLBACK_TICKET_TEMPLATE });
}

export function vulnerabilityFields(record: VulnerabilityRecord): TemplateFields {
  return {
    scan_type: sanitizeValue(record.scanType),
    vuln_id: sanitizeValue(record.id),
    name: sanitizeValue(record.name),
    cvss_score: sanitizeValue(record.cvssScore),
    total_count: sanitizeValue(record.totalCount),
    cve_cwe: sanitizeValue(record.cveCwe),
    finding_type: sanitizeValue(record.findingType),
    compliance: sanitizeValue(record.compliance),
    teams_impacted: sanitizeValue(record.teams),
    unique_instances: sanitizeValue(record.uniqueInstances),
    description: sanitizeValue(record.description ?? 'No description provided'),
    recommendation: sanitizeValue(record.recommendation ?? 'No recommendation provided'),
    exploit_available: sanitizeValue(record.exploitAvailable),
    exploit_rating: sanitizeValue(record.exploitRating),
    ease_of_attack: sanitizeValue(record.easeOfAttack),
    exploit_consequence: sanitizeValue(record.exploitConsequence),
    mitigation: sanitizeValue(record.mitigation),
    zero_day: sanitizeValue(record.zeroDay),
    epss_score: sanitizeValue(record.epssScore),
    cisa_kev: sanitizeValue(record.cisaKev),
  };
}

export function renderVulnerabilityIssue(record: VulnerabilityRecord, template: string): string {
  return renderTemplate(template, vulnerabilityFields(record));
}

export function vulnerabilityTitle(record: VulnerabilityRecord): string {
  return `[Security] ${record.name ?? 'Vulnerability'} - ${record.id ?? 'Unknown ID'}`;
}

export function ticketFields(ticket: TicketReference): TemplateFields {
  return {
    jira_issue_key: sanitizeValue(ticket.key || 'UNKNOWN'),
    jira_summary: sanitizeValue(ticket.summary || 'No summary provided'),
    jira_description: sanitizeValue(ticket.description || 'No description provided'),
  };
}

export function renderTicketIssue(ticket: TicketReference, template: string): string {
  return renderTemplate(template, ticketFields(ticket));
}

/**
 * `[Security] <summary> - <key>`, or `[Security] <key>` when the ticket has
 * no summary.
 */
export function ticketTitle(ticket: TicketReference): string {
  const summary = ticket.summary?.trim();
  return summary ? `[Security] ${summary} - ${ticket.key}` : `[Security] ${ticket.key}`;
}
