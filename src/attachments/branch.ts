import { setTimeout as sleep } from 'node:timers/promises';
import { BranchUnavailableError } from '../errors.js';
import type { ContentsTransport } from '../github/contents.js';
import type { Logger } from '../logging/logger.js';

/** Wait before re-checking a branch another writer reported as created. */
export const BRANCH_CONFIRM_DELAY_MS = 1000;

export type EnsureBranchResult = 'existing' | 'created' | 'confirmed';

export interface EnsureBranchOptions {
  confirmDelayMs?: number;
}

/**
 * Make sure `branch` exists, creating it from the head of the default branch.
 *
 * Two runs may race to create the same branch. The loser gets "Reference
 * already exists" back from `createRef`; it then waits briefly and checks
 * that the branch is really there before treating it as present.
 */
export async function ensureBranch(
  transport: ContentsTransport,
  branch: string,
  logger: Logger,
  options: EnsureBranchOptions = {},
): Promise<EnsureBranchResult> {
  if (await transport.branchExists(branch)) {
    logger.debug(`Branch ${branch} exists (${transport.name})`);
    return 'existing';
  }

  const defaultBranch = await transport.getDefaultBranch();
  const sha = await transport.getBranchHeadSha(defaultBranch);
  logger.info(`Creating branch ${branch} from ${defaultBranch} (${transport.name})`);

  const result = await transport.createRef(branch, sha);
  if (result === 'created') return 'created';

  await sleep(options.confirmDelayMs ?? BRANCH_CONFIRM_DELAY_MS);
  if (await transport.branchExists(branch)) {
    logger.debug(`Branch ${branch} was created concurrently; confirmed present`);
    return 'confirmed';
  }
  throw new BranchUnavailableError(
    `Branch ${branch} was reported as existing but could not be found`,
    branch,
  );
}
