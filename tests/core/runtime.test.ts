import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigLoadError, parseEnvConfig } from '../../src/config/loader.js';
import { BridgeRuntime } from '../../src/core/runtime.js';
import { TemplateNotFoundError } from '../../src/errors.js';
import { makeLogger } from '../helpers/mocks.js';

describe('BridgeRuntime', () => {
  let dir: string;
  let csv: string;
  const fetchMock = vi.fn();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runtime-'));
    csv = join(dir, 'scan.csv');
    await writeFile(
      csv,
      ['ID,Name,CVSS Score,Unique Instance List', 'V-1,SQL injection,9.1,brand_landscape_analyzer/api', 'V-2,Weak cipher,5.3,billing'].join('\n'),
    );
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
    await rm(dir, { recursive: true, force: true });
  });

  it('prints the scan plan in dry-run mode without credentials', async () => {
    const lines: string[] = [];
    const runtime = new BridgeRuntime(parseEnvConfig({}), {
      dryRun: true,
      print: (line) => lines.push(line),
      logger: makeLogger(),
    });

    const summary = await runtime.createScanIssues(csv);

    expect(summary).toEqual({ considered: 2, created: 0, failed: 0, skipped: 1 });
    expect(lines).toContain('  - [Security] SQL injection - V-1');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects a live scan run without a token before any network call', async () => {
    const runtime = new BridgeRuntime(parseEnvConfig({ GITHUB_REPOSITORY: 'acme/widgets' }), { logger: makeLogger() });

    await expect(runtime.createScanIssues(csv)).rejects.toThrow(
      new ConfigLoadError('GH_PAT_AGENT environment variable not set'),
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('requires the vulnerability template', async () => {
    const runtime = new BridgeRuntime(parseEnvConfig({ TEMPLATE_DIR: dir }), { dryRun: true, logger: makeLogger() });

    await expect(runtime.createScanIssues(csv)).rejects.toBeInstanceOf(TemplateNotFoundError);
  });

  it('falls back to the built-in ticket template', async () => {
    const lines: string[] = [];
    const runtime = new BridgeRuntime(
      parseEnvConfig({ TEMPLATE_DIR: dir, JIRA_ISSUE_KEY: 'SEC-5', ATTACHMENTS_DIR: join(dir, 'none') }),
      { dryRun: true, print: (line) => lines.push(line), logger: makeLogger() },
    );

    await expect(runtime.createTicketIssue()).resolves.toEqual({ published: null, attachments: [] });
    expect(lines).toContain('  Title: [Security] SEC-5');
  });

  it('needs JIRA_ISSUE_KEY for a ticket run', async () => {
    const runtime = new BridgeRuntime(parseEnvConfig({}), { dryRun: true, logger: makeLogger() });

    await expect(runtime.createTicketIssue()).rejects.toThrow('JIRA_ISSUE_KEY environment variable not set');
  });

  it('needs an issue number to upload attachments', async () => {
    const runtime = new BridgeRuntime(parseEnvConfig({ JIRA_ISSUE_KEY: 'SEC-5' }), { dryRun: true, logger: makeLogger() });

    await expect(runtime.uploadAttachments()).rejects.toThrow('ISSUE_NUMBER environment variable not set');
  });
});
