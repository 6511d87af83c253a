import { AttachmentUploader, type AttachmentUploadOutcome } from '../attachments/uploader.js';
import { requireGitHubAccess, requireIssueNumber, requireTicket } from '../config/loader.js';
import type { BridgeConfig } from '../config/schema.js';
import { GitHubAPI } from '../github/api.js';
import { GitHubRestClient } from '../github/rest-client.js';
import { toTicketReference } from '../input/ticket.js';
import { loadVulnerabilities } from '../input/vulnerability-loader.js';
import { filterAssignableAssignees } from '../issues/assignees.js';
import { Logger } from '../logging/logger.js';
import { createApiPublishStrategy } from '../publish/api-strategy.js';
import { createCliPublishStrategy } from '../publish/cli-strategy.js';
import { IssuePublisher } from '../publish/publisher.js';
import {
  TICKET_TEMPLATE,
  VULNERABILITY_TEMPLATE,
  createTemplateStore,
} from '../render/issue-renderer.js';
import type { TemplateStore } from '../render/template-store.js';
import { runAttachmentUpload } from './attachment-run.js';
import { runScanIssues, type ScanRunSummary } from './scan-run.js';
import { runTicketIssue, type TicketRunSummary } from './ticket-run.js';

export interface RuntimeOptions {
  /** Overrides `DRY_RUN` from the environment when set. */
  dryRun?: boolean;
  print?: (line: string) => void;
  logger?: Logger;
}

interface GitHubComponents {
  api: GitHubAPI;
  publisher: IssuePublisher;
  uploader: AttachmentUploader;
}

/**
 * Wires configuration into the GitHub transports, the template store and the
 * run functions. Credentials are checked before anything touches the network.
 */
export class BridgeRuntime {
  private readonly logger: Logger;
  private readonly templates: TemplateStore;
  private readonly dryRun: boolean;
  private readonly print: (line: string) => void;

  constructor(
    private readonly config: BridgeConfig,
    options: RuntimeOptions = {},
  ) {
    this.logger =
      options.logger ??
      new Logger({
        source: 'bridge',
        logDir: config.logging.dir,
        level: config.logging.level,
        console: true,
      });
    this.templates = createTemplateStore(config.templateDir);
    this.dryRun = options.dryRun ?? config.dryRun;
    this.print = options.print ?? ((line) => console.log(line));
  }

  /**
   * One issue per spreadsheet row aimed at the target instance.
   */
  async createScanIssues(inputFile: string, extraLabels: readonly string[] = []): Promise<ScanRunSummary> {
    const template = await this.templates.load(VULNERABILITY_TEMPLATE, { required: true });
    const records = await loadVulnerabilities(inputFile);
    this.logger.info(`Loaded ${records.length} rows from ${inputFile}`);

    if (this.dryRun) {
      return runScanIssues(records, {
        targetInstance: this.config.targetInstance,
        template,
        assignees: this.config.assignees,
        extraLabels,
        output: { dryRun: true, print: this.print },
        logger: this.logger,
      });
    }

    const github = this.connect();
    const assignees = await filterAssignableAssignees(github.api, this.config.assignees, this.logger);
    return runScanIssues(records, {
      targetInstance: this.config.targetInstance,
      template,
      assignees,
      extraLabels,
      output: { dryRun: false, publisher: github.publisher },
      logger: this.logger,
    });
  }

  /**
   * One issue for the ticket described by the `JIRA_*` variables.
   */
  async createTicketIssue(extraLabels: readonly string[] = []): Promise<TicketRunSummary> {
    const ticket = toTicketReference(requireTicket(this.config));
    const template = await this.templates.load(TICKET_TEMPLATE);
    const options = {
      template,
      extraLabels,
      attachmentsDir: this.config.attachments.dir,
      logger: this.logger,
    };

    if (this.dryRun) {
      return runTicketIssue(ticket, {
        ...options,
        assignees: this.config.assignees,
        output: { dryRun: true, print: this.print },
      });
    }

    const github = this.connect();
    const assignees = await filterAssignableAssignees(github.api, this.config.assignees, this.logger);
    return runTicketIssue(ticket, {
      ...options,
      assignees,
      output: { dryRun: false, publisher: github.publisher, api: github.api, uploader: github.uploader },
    });
  }

  /**
   * Attach local files to an issue that already exists.
   */
  async uploadAttachments(overrides: { issueNumber?: number; dir?: string } = {}): Promise<AttachmentUploadOutcome[]> {
    const ticket = toTicketReference(requireTicket(this.config));
    const issueNumber = overrides.issueNumber ?? requireIssueNumber(this.config);
    const attachmentsDir = overrides.dir ?? this.config.attachments.dir;

    if (this.dryRun) {
      return runAttachmentUpload(ticket, {
        issueNumber,
        attachmentsDir,
        output: { dryRun: true, print: this.print },
        logger: this.logger,
      });
    }

    const github = this.connect();
    return runAttachmentUpload(ticket, {
      issueNumber,
      attachmentsDir,
      output: { dryRun: false, api: github.api, uploader: github.uploader },
      logger: this.logger,
    });
  }

  private connect(): GitHubComponents {
    const { token, repository } = requireGitHubAccess(this.config);
    const { apiUrl, rawBaseUrl, cliCommand, requestTimeoutMs } = this.config.github;

    const api = new GitHubAPI(repository, this.logger.child('github'), undefined, {
      token,
      baseUrl: apiUrl,
      timeoutMs: requestTimeoutMs,
    });
    const rest = new GitHubRestClient(repository, this.logger.child('github'), {
      token,
      apiUrl,
      timeoutMs: requestTimeoutMs,
    });

    const publisher = new IssuePublisher(
      [
        createApiPublishStrategy(api, this.logger),
        createCliPublishStrategy({
          logger: this.logger,
          repository,
          token,
          command: cliCommand,
          timeoutMs: requestTimeoutMs,
        }),
      ],
      this.logger,
    );
    const uploader = new AttachmentUploader([api, rest], this.logger.child('attachments'), {
      repository,
      branch: this.config.attachments.branch,
      rawBaseUrl,
    });

    return { api, publisher, uploader };
  }
}
