import { encodeContentPath } from '../github/contents.js';

/**
 * Make a filename safe for a repository path and a markdown link: spaces
 * become underscores and anything other than a letter, a digit, `.`, `_` or
 * `-` is dropped. Letters and digits from any script are kept.
 * Never returns an empty string, and applying it twice changes nothing.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(/ /g, '_').replace(/[^\p{L}\p{N}._-]/gu, '');
  return cleaned || 'file';
}

export function attachmentRepoPath(ticketKey: string, filename: string): string {
  return `attachments/${ticketKey}/${sanitizeFilename(filename)}`;
}

export function rawContentUrl(rawBase: string, repository: string, branch: string, path: string): string {
  return `${rawBase.replace(/\/+$/, '')}/${repository}/${branch}/${encodeContentPath(path)}`;
}
