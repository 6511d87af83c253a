import type { TicketConfig } from '../config/schema.js';

export interface AttachmentHint {
  filename: string;
  metadata?: string;
}

export interface TicketReference {
  readonly key: string;
  readonly summary?: string;
  readonly description?: string;
  readonly attachmentHints: readonly AttachmentHint[];
}

/**
 * Parse a comma-separated list of `filename:metadata` pairs. The metadata part
 * is optional; entries without a filename are dropped.
 */
export function parseAttachmentHints(raw: string | undefined): AttachmentHint[] {
  if (!raw) return [];

  const hints: AttachmentHint[] = [];
  for (const part of raw.split(',')) {
    const entry = part.trim();
    const sep = entry.indexOf(':');
    const filename = (sep === -1 ? entry : entry.slice(0, sep)).trim();
    if (!filename) continue;
    const metadata = sep === -1 ? '' : entry.slice(sep + 1).trim();
    hints.push(metadata ? { filename, metadata } : { filename });
  }
  return hints;
}

export function toTicketReference(ticket: TicketConfig): TicketReference {
  return Object.freeze({
    key: ticket.key,
    summary: ticket.summary,
    description: ticket.description,
    attachmentHints: parseAttachmentHints(ticket.attachmentHints),
  });
}
