import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import { exec, type CommandRunner } from '../util/process.js';
import type { IssueDraft, IssuePublishStrategy } from './types.js';

export interface CliPublishOptions {
  logger: Logger;
  /** Repository passed as `--repo`; the CLI infers it from the cwd when omitted. */
  repository?: string;
  /** Exported as GH_TOKEN to the CLI. */
  token?: string;
  command?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export function buildIssueCreateArgs(draft: IssueDraft, repository?: string): string[] {
  const args = ['issue', 'create', '--title', draft.title, '--body', draft.body];
  if (repository) {
    args.push('--repo', repository);
  }
  if (draft.assignees.length > 0) {
    args.push('--assignee', draft.assignees.join(','));
  }
  for (const label of draft.labels) {
    args.push('--label', label);
  }
  return args;
}

/**
 * Create issues by shelling out to the `gh` CLI. The CLI prints the new
 * issue's URL, so success carries a reference but no handle.
 */
export function createCliPublishStrategy(options: CliPublishOptions): IssuePublishStrategy {
  const { logger, repository, token } = options;
  const command = options.command ?? 'gh';
  const run = options.runner ?? exec;
  const timeout = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const env = token ? { ...process.env, GH_TOKEN: token } : process.env;

  return {
    name: 'cli',
    async publish(draft) {
      const auth = await run(command, ['auth', 'status'], { env, timeout });
      if (auth.exitCode !== 0) {
        const reason = `${command} CLI not authenticated. Run '${command} auth login --with-token' or set GH_TOKEN.`;
        logger.error(reason, { data: { stderr: auth.stderr.trim() } });
        return { status: 'failed', transport: 'cli', reason };
      }

      const result = await run(command, buildIssueCreateArgs(draft, repository), { env, timeout });
      if (result.exitCode !== 0) {
        const detail = result.timedOut ? 'timed out' : result.stderr.trim() || `exit code ${result.exitCode}`;
        logger.error(`Failed to create issue via ${command} CLI: ${draft.title}: ${detail}`);
        return { status: 'failed', transport: 'cli', reason: detail };
      }

      const reference = result.stdout.trim();
      logger.info(`Created issue via ${command} CLI: ${draft.title} ${reference}`);
      return { status: 'created', transport: 'cli', handle: null, reference };
    },
  };
}
