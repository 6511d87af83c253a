import { resolve, isAbsolute } from 'node:path';
import dotenv from 'dotenv';
import { BridgeConfigSchema, type BridgeConfig, type TicketConfig } from './schema.js';
import { exists } from '../util/fs.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

type Env = Record<string, string | undefined>;

/** Blank variables count as unset. */
function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envNumber(env: Env, name: string): number | undefined {
  const value = envValue(env, name);
  return value === undefined ? undefined : Number(value);
}

function envList(env: Env, name: string): string[] {
  return (envValue(env, name) ?? '')
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Map environment variables onto the config schema and validate.
 */
export function parseEnvConfig(env: Env): BridgeConfig {
  const ticketKey = envValue(env, 'JIRA_ISSUE_KEY');

  const raw = {
    repository: envValue(env, 'GITHUB_REPOSITORY'),
    token: envValue(env, 'GH_PAT_AGENT') ?? envValue(env, 'GITHUB_TOKEN') ?? envValue(env, 'GH_TOKEN'),
    assignees: envList(env, 'ASSIGNEES'),
    dryRun: envValue(env, 'DRY_RUN')?.toLowerCase() === 'true',
    targetInstance: envValue(env, 'TARGET_INSTANCE')?.toLowerCase(),
    ticket: ticketKey
      ? {
          key: ticketKey,
          summary: envValue(env, 'JIRA_SUMMARY'),
          description: envValue(env, 'JIRA_DESCRIPTION'),
          attachmentHints: envValue(env, 'JIRA_ATTACHMENTS'),
        }
      : undefined,
    issueNumber: envNumber(env, 'ISSUE_NUMBER'),
    attachments: {
      dir: envValue(env, 'ATTACHMENTS_DIR'),
      branch: envValue(env, 'ATTACHMENTS_BRANCH'),
    },
    github: {
      apiUrl: envValue(env, 'GITHUB_API_URL'),
      rawBaseUrl: envValue(env, 'GITHUB_RAW_BASE_URL'),
      cliCommand: envValue(env, 'GH_CLI_COMMAND'),
      requestTimeoutMs: envNumber(env, 'REQUEST_TIMEOUT_MS'),
    },
    templateDir: envValue(env, 'TEMPLATE_DIR'),
    logging: {
      level: envValue(env, 'LOG_LEVEL')?.toLowerCase(),
      dir: envValue(env, 'LOG_DIR'),
    },
  };

  const result = BridgeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid configuration:\n${issues}`, result.error);
  }

  return Object.freeze(result.data);
}

/**
 * Load `.env` (or an explicit env file) into the process environment, then
 * parse the resulting configuration.
 */
export async function loadConfig(options: { envFile?: string } = {}): Promise<BridgeConfig> {
  if (options.envFile) {
    const absPath = isAbsolute(options.envFile) ? options.envFile : resolve(process.cwd(), options.envFile);
    if (!(await exists(absPath))) {
      throw new ConfigLoadError(`Env file not found: ${absPath}`);
    }
    const loaded = dotenv.config({ path: absPath });
    if (loaded.error) {
      throw new ConfigLoadError(`Failed to read env file: ${absPath}`, loaded.error);
    }
  } else {
    // A missing default .env is fine; variables may come from the shell
    dotenv.config();
  }

  return parseEnvConfig(process.env);
}

export interface GitHubAccess {
  token: string;
  repository: string;
}

/**
 * Credentials are checked before any network call is made.
 */
export function requireGitHubAccess(config: BridgeConfig): GitHubAccess {
  if (!config.token) {
    throw new ConfigLoadError('GH_PAT_AGENT environment variable not set');
  }
  if (!config.repository) {
    throw new ConfigLoadError('GITHUB_REPOSITORY environment variable not set');
  }
  return { token: config.token, repository: config.repository };
}

export function requireTicket(config: BridgeConfig): TicketConfig {
  if (!config.ticket) {
    throw new ConfigLoadError('JIRA_ISSUE_KEY environment variable not set');
  }
  return config.ticket;
}

export function requireIssueNumber(config: BridgeConfig): number {
  if (config.issueNumber === undefined) {
    throw new ConfigLoadError('ISSUE_NUMBER environment variable not set');
  }
  return config.issueNumber;
}
