import type { GitHubAPI } from '../github/api.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';

/**
 * Keep only the logins that are collaborators on the repository; GitHub
 * rejects issue creation when any assignee is not assignable.
 */
export async function filterAssignableAssignees(
  api: Pick<GitHubAPI, 'isCollaborator'>,
  assignees: readonly string[],
  logger: Logger,
): Promise<string[]> {
  const valid: string[] = [];
  const invalid: string[] = [];

  for (const username of assignees) {
    try {
      if (await api.isCollaborator(username)) {
        valid.push(username);
      } else {
        invalid.push(username);
      }
    } catch (err) {
      logger.warn(`GitHub error when checking assignee '${username}': ${errorMessage(err)}`);
      invalid.push(username);
    }
  }

  if (valid.length > 0) {
    logger.info(`Will attempt to assign issues to: ${valid.join(', ')}`);
  }
  if (invalid.length > 0) {
    logger.warn(`These assignees are not assignable and will be skipped: ${invalid.join(', ')}`);
  }
  return valid;
}
