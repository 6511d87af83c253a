import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { errorMessage } from '../errors.js';
import type { ContentsTransport } from '../github/contents.js';
import type { Logger } from '../logging/logger.js';
import type { RemoteIssueHandle } from '../publish/types.js';
import { ensureBranch } from './branch.js';
import { attachmentRepoPath, rawContentUrl, sanitizeFilename } from './filename.js';

export type AttachmentUploadOutcome =
  | {
      status: 'uploaded';
      rawUrl: string;
      repoPath: string;
      /** Name of the contents transport that wrote the file. */
      transport: string;
    }
  | {
      status: 'failed';
      reason: string;
      localPath: string;
    };

export interface AttachmentUploaderOptions {
  /** `owner/repo` used to build raw content URLs. */
  repository: string;
  branch: string;
  rawBaseUrl: string;
  confirmDelayMs?: number;
}

/**
 * Mirrors local attachment files onto a shared branch and links them from
 * the issue in a comment.
 *
 * Transports are tried in order, each exactly once per file. `upload` never
 * throws; every problem comes back as a `failed` outcome and, where the
 * issue can still be reached, a comment naming the local file.
 */
export class AttachmentUploader {
  constructor(
    private readonly transports: readonly ContentsTransport[],
    private readonly logger: Logger,
    private readonly options: AttachmentUploaderOptions,
  ) {}

  async upload(handle: RemoteIssueHandle, ticketKey: string, localPath: string): Promise<AttachmentUploadOutcome> {
    const filename = sanitizeFilename(basename(localPath));
    const repoPath = attachmentRepoPath(ticketKey, filename);
    const { branch } = this.options;

    let content: string;
    try {
      content = (await readFile(localPath)).toString('base64');
    } catch (err) {
      return this.fail(handle, ticketKey, localPath, `could not read file: ${errorMessage(err)}`);
    }

    const reasons: string[] = [];
    for (const transport of this.transports) {
      try {
        await ensureBranch(transport, branch, this.logger, { confirmDelayMs: this.options.confirmDelayMs });
        const sha = await transport.getFileSha(repoPath, branch);
        this.logger.info(`Uploading ${localPath} -> ${repoPath} via ${transport.name}`, {
          issueNumber: handle.number,
          ticketKey,
          data: { existingSha: sha },
        });
        await transport.putFile({
          path: repoPath,
          content,
          message: `Add attachment ${filename} for ${ticketKey}`,
          branch,
          sha: sha ?? undefined,
        });
      } catch (err) {
        const reason = `${transport.name}: ${errorMessage(err)}`;
        reasons.push(reason);
        this.logger.warn(`Upload of ${repoPath} failed (${reason})`, { issueNumber: handle.number, ticketKey });
        continue;
      }

      const rawUrl = rawContentUrl(this.options.rawBaseUrl, this.options.repository, branch, repoPath);
      await this.comment(handle, ticketKey, [`Uploaded attachment for ${ticketKey}:`, '', `![${filename}](${rawUrl})`]);
      this.logger.event({
        type: 'attachment-uploaded',
        ticketKey,
        issueNumber: handle.number,
        repoPath,
        rawUrl,
        transport: transport.name,
      });
      return { status: 'uploaded', rawUrl, repoPath, transport: transport.name };
    }

    const reason = reasons.length > 0 ? reasons.join('; ') : 'no contents transport configured';
    return this.fail(handle, ticketKey, localPath, reason);
  }

  /**
   * Upload files one after another, in the order given.
   */
  async uploadAll(
    handle: RemoteIssueHandle,
    ticketKey: string,
    localPaths: readonly string[],
  ): Promise<AttachmentUploadOutcome[]> {
    const outcomes: AttachmentUploadOutcome[] = [];
    for (const localPath of localPaths) {
      outcomes.push(await this.upload(handle, ticketKey, localPath));
    }
    return outcomes;
  }

  private async fail(
    handle: RemoteIssueHandle,
    ticketKey: string,
    localPath: string,
    reason: string,
  ): Promise<AttachmentUploadOutcome> {
    this.logger.event(
      { type: 'attachment-failed', ticketKey, issueNumber: handle.number, localPath, reason },
      'error',
    );
    await this.comment(handle, ticketKey, [
      `⚠️ Attachment \`${basename(localPath)}\` could not be uploaded to branch \`${this.options.branch}\`.`,
      '',
      `Local path: \`${localPath}\``,
      '',
      `Reason: ${reason}`,
    ]);
    return { status: 'failed', reason, localPath };
  }

  private async comment(handle: RemoteIssueHandle, ticketKey: string, lines: readonly string[]): Promise<void> {
    try {
      await handle.addComment(lines.join('\n'));
    } catch (err) {
      this.logger.error(`Failed to post comment on issue #${handle.number}: ${errorMessage(err)}`, {
        issueNumber: handle.number,
        ticketKey,
      });
    }
  }
}
