#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config/loader.js';
import { BridgeRuntime } from './core/runtime.js';
import { withCommandHandler } from './cli/command-error-handler.js';

interface CreateOptions {
  dryRun?: boolean;
  labels?: string[];
  fromTicket?: boolean;
  fromJira?: boolean;
  envFile?: string;
}

interface UploadOptions {
  issue?: number;
  dir?: string;
  dryRun?: boolean;
  envFile?: string;
}

function parseIssueOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`expected a positive issue number, got "${value}"`);
  }
  return n;
}

const program = new Command();

program
  .name('vuln-issues')
  .description('Create GitHub issues from vulnerability spreadsheets and Jira tickets')
  .version('0.1.0');

// ─── create ───────────────────────────────────────────
program
  .command('create [input-file]', { isDefault: true })
  .description('Create issues from a vulnerability spreadsheet, or one issue from Jira variables')
  .option('-d, --dry-run', 'Print issues without creating them')
  .option('-l, --labels <labels...>', 'Additional labels to add to issues')
  .option('--from-ticket', 'Create an issue from the JIRA_* environment variables')
  .option('--from-jira', 'Alias for --from-ticket')
  .option('--env-file <path>', 'Load environment variables from this file instead of .env')
  .action(withCommandHandler(async (inputFile: string | undefined, opts: CreateOptions) => {
    const config = await loadConfig({ envFile: opts.envFile });
    const runtime = new BridgeRuntime(config, { dryRun: opts.dryRun ? true : undefined });
    const labels = opts.labels ?? [];

    if (opts.fromTicket || opts.fromJira) {
      const summary = await runtime.createTicketIssue(labels);
      if (summary.published?.status === 'created') {
        console.log(chalk.green(`✓ Created issue: ${summary.published.reference}`));
      }
      const failed = summary.attachments.filter((outcome) => outcome.status === 'failed');
      if (failed.length > 0) {
        console.log(chalk.yellow(`⚠ ${failed.length} attachment(s) could not be uploaded`));
      }
      return;
    }

    const summary = await runtime.createScanIssues(inputFile ?? 'vulnerabilities-issues.xlsx', labels);
    if (config.dryRun || opts.dryRun) return;

    console.log(
      `Considered ${summary.considered} rows: ` +
        chalk.green(`${summary.created} created`) +
        `, ${summary.skipped} skipped, ` +
        (summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : '0 failed'),
    );
    if (summary.failed > 0) {
      process.exit(1);
    }
  }));

// ─── upload-attachments ───────────────────────────────
program
  .command('upload-attachments')
  .description('Upload local attachment files to an existing issue and link them in comments')
  .option('-i, --issue <number>', 'Issue number (defaults to ISSUE_NUMBER)', parseIssueOption)
  .option('--dir <path>', 'Directory holding the files (defaults to ATTACHMENTS_DIR)')
  .option('-d, --dry-run', 'List the files without uploading them')
  .option('--env-file <path>', 'Load environment variables from this file instead of .env')
  .action(withCommandHandler(async (opts: UploadOptions) => {
    const config = await loadConfig({ envFile: opts.envFile });
    const runtime = new BridgeRuntime(config, { dryRun: opts.dryRun ? true : undefined });
    const outcomes = await runtime.uploadAttachments({ issueNumber: opts.issue, dir: opts.dir });

    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
    if (outcomes.length > 0) {
      console.log(`${chalk.green(`${outcomes.length - failed} uploaded`)}, ${failed} failed`);
    }
    if (failed > 0) {
      process.exit(1);
    }
  }));

await program.parseAsync(process.argv);
