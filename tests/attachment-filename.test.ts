import { describe, it, expect } from 'vitest';
import { attachmentRepoPath, rawContentUrl, sanitizeFilename } from '../src/attachments/filename.js';

describe('sanitizeFilename', () => {
  it('replaces spaces and strips unsafe characters', () => {
    expect(sanitizeFilename('Screen Shot (1).png')).toBe('Screen_Shot_1.png');
    expect(sanitizeFilename('résumé#2.pdf')).toBe('résumé2.pdf');
  });

  it('keeps letters and digits from any script', () => {
    expect(sanitizeFilename('スクリーン ショット.png')).toBe('スクリーン_ショット.png');
    expect(sanitizeFilename('отчёт-٣.txt')).toBe('отчёт-٣.txt');
    expect(sanitizeFilename('画像.png')).not.toBe(sanitizeFilename('スクリーン.png'));
  });

  it('never returns an empty name', () => {
    expect(sanitizeFilename('')).toBe('file');
    expect(sanitizeFilename('#!?')).toBe('file');
  });

  it('is idempotent', () => {
    for (const name of ['a b c.txt', 'x/y\\z.log', '', '..hidden', 'ok-name_1.PNG', 'café 2.png']) {
      const once = sanitizeFilename(name);
      expect(sanitizeFilename(once)).toBe(once);
    }
  });
});

describe('attachmentRepoPath', () => {
  it('places the file in a folder per ticket', () => {
    expect(attachmentRepoPath('SEC-42', 'crash log.txt')).toBe('attachments/SEC-42/crash_log.txt');
  });
});

describe('rawContentUrl', () => {
  it('joins the raw host, repository, branch and path', () => {
    expect(
      rawContentUrl('https://raw.githubusercontent.com/', 'acme/widgets', 'issue-attachments', 'attachments/SEC-42/a.png'),
    ).toBe('https://raw.githubusercontent.com/acme/widgets/issue-attachments/attachments/SEC-42/a.png');
  });

  it('percent-encodes each path segment', () => {
    expect(
      rawContentUrl('https://raw.githubusercontent.com', 'acme/widgets', 'issue-attachments', 'attachments/SEC-42/é.png'),
    ).toBe('https://raw.githubusercontent.com/acme/widgets/issue-attachments/attachments/SEC-42/%C3%A9.png');
  });
});
