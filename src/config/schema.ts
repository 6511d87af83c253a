import { z } from 'zod';

export const DEFAULT_TARGET_INSTANCE = 'brand_landscape_analyzer';
export const DEFAULT_ATTACHMENTS_BRANCH = 'issue-attachments';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const TicketConfigSchema = z.object({
  /** Jira issue key, e.g. "SEC-42". */
  key: z.string().min(1),
  /** Optional: the title falls back to the key alone when blank. */
  summary: z.string().optional(),
  description: z.string().optional(),
  /** Comma-separated `filename:metadata` pairs naming the files to upload. */
  attachmentHints: z.string().optional(),
});

export type TicketConfig = z.infer<typeof TicketConfigSchema>;

export const BridgeConfigSchema = z.object({
  /** Target repository in "owner/repo" form. */
  repository: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, 'must be in "owner/repo" form')
    .optional(),

  /** Token used by the Octokit client, the REST fallback and the gh CLI. */
  token: z.string().min(1).optional(),

  /** GitHub logins to assign to every created issue. */
  assignees: z.array(z.string().min(1)).default([]),

  /** Print what would be created without calling GitHub. */
  dryRun: z.boolean().default(false),

  /** Rows whose instance list does not contain this (case-insensitive) are skipped. */
  targetInstance: z.string().default(DEFAULT_TARGET_INSTANCE),

  /** Ticket inputs for the ticket-driven run. */
  ticket: TicketConfigSchema.optional(),

  /** Existing issue to attach files to (upload-attachments command). */
  issueNumber: z.number().int().positive().optional(),

  attachments: z
    .object({
      /** Local directory holding files to upload. */
      dir: z.string().default('attachments'),
      /** Shared branch that stores uploaded attachments. */
      branch: z.string().min(1).default(DEFAULT_ATTACHMENTS_BRANCH),
    })
    .default({}),

  github: z
    .object({
      apiUrl: z.string().url().default('https://api.github.com'),
      rawBaseUrl: z.string().url().default('https://raw.githubusercontent.com'),
      cliCommand: z.string().min(1).default('gh'),
      /** Upper bound for every network call and CLI invocation. */
      requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    })
    .default({}),

  /** Directory of operator-editable issue templates. Defaults to the bundled `templates/`. */
  templateDir: z.string().optional(),

  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      dir: z.string().optional(),
    })
    .default({}),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
