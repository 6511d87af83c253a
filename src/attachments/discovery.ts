import { stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { AttachmentHint } from '../input/ticket.js';
import type { Logger } from '../logging/logger.js';
import { listFiles } from '../util/fs.js';

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find the local files to attach to a ticket issue.
 *
 * With hints, each hinted filename is looked up in `dir` in hint order and
 * missing ones are logged. Without hints, every regular file in `dir` is
 * returned, sorted by name. A missing directory yields nothing.
 */
export async function discoverAttachments(
  dir: string,
  hints: readonly AttachmentHint[],
  logger: Logger,
): Promise<string[]> {
  if (hints.length === 0) {
    const files = await listFiles(dir);
    if (files.length === 0) {
      logger.debug(`No attachments found in ${dir}`);
    }
    return files;
  }

  const found: string[] = [];
  for (const hint of hints) {
    // Hints name files inside dir; any path part is ignored
    const path = join(dir, basename(hint.filename));
    if (found.includes(path)) continue;
    if (await isRegularFile(path)) {
      found.push(path);
    } else {
      logger.warn(`Attachment ${hint.filename} listed on the ticket was not found in ${dir}`);
    }
  }
  return found;
}
