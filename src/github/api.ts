import { Octokit } from '@octokit/rest';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/schema.js';
import { extractStatusCode } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { REF_EXISTS_MESSAGE, type ContentsTransport, type CreateRefResult, type PutFileParams } from './contents.js';

export interface GitHubAPIOptions {
  token?: string;
  /** API root, e.g. a GitHub Enterprise `https://ghe.example.com/api/v3`. */
  baseUrl?: string;
  timeoutMs?: number;
}

export interface CreateIssueParams {
  title: string;
  body: string;
  assignees?: readonly string[];
  labels?: readonly string[];
}

export interface IssueRef {
  number: number;
  url: string;
  title: string;
}

/**
 * GitHub API layer backed by Octokit. Issues, comments, collaborators, and the
 * branch/contents operations the attachment uploader needs.
 *
 * A 404 on a lookup is returned as a value (`false` / `null`), not thrown.
 */
export class GitHubAPI implements ContentsTransport {
  readonly name = 'octokit';

  readonly owner: string;
  readonly repo: string;
  private readonly octokit: Octokit;
  private readonly timeoutMs: number;

  constructor(
    readonly repository: string,
    private readonly logger: Logger,
    octokit?: Octokit,
    options: GitHubAPIOptions = {},
  ) {
    const [owner, repo] = repository.split('/');
    this.owner = owner;
    this.repo = repo;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.octokit = octokit ?? new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: 'vuln-issue-bridge',
    });
  }

  // ── Issues ──

  async createIssue(params: CreateIssueParams): Promise<IssueRef> {
    const { data } = await this.octokit.rest.issues.create({
      owner: this.owner,
      repo: this.repo,
      title: params.title,
      body: params.body,
      assignees: params.assignees && params.assignees.length > 0 ? [...params.assignees] : undefined,
      labels: params.labels && params.labels.length > 0 ? [...params.labels] : undefined,
      request: this.requestOptions(),
    });
    return { number: data.number, url: data.html_url, title: data.title };
  }

  async getIssue(issueNumber: number): Promise<IssueRef> {
    const { data } = await this.octokit.rest.issues.get({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      request: this.requestOptions(),
    });
    return { number: data.number, url: data.html_url, title: data.title };
  }

  /**
   * Add a comment to an issue. Returns the comment URL.
   */
  async addIssueComment(issueNumber: number, body: string): Promise<string> {
    const { data } = await this.octokit.rest.issues.createComment({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      body,
      request: this.requestOptions(),
    });
    return data.html_url;
  }

  async isCollaborator(username: string): Promise<boolean> {
    try {
      await this.octokit.rest.repos.checkCollaborator({
        owner: this.owner,
        repo: this.repo,
        username,
        request: this.requestOptions(),
      });
      return true;
    } catch (err) {
      if (extractStatusCode(err) === 404) return false;
      throw err;
    }
  }

  // ── Branches & contents ──

  async branchExists(branch: string): Promise<boolean> {
    try {
      await this.octokit.rest.repos.getBranch({
        owner: this.owner,
        repo: this.repo,
        branch,
        request: this.requestOptions(),
      });
      return true;
    } catch (err) {
      if (extractStatusCode(err) === 404) {
        this.logger.debug(`Branch ${branch} not found in ${this.repository}`);
        return false;
      }
      throw err;
    }
  }

  async getDefaultBranch(): Promise<string> {
    const { data } = await this.octokit.rest.repos.get({
      owner: this.owner,
      repo: this.repo,
      request: this.requestOptions(),
    });
    return data.default_branch;
  }

  async getBranchHeadSha(branch: string): Promise<string> {
    const { data } = await this.octokit.rest.git.getRef({
      owner: this.owner,
      repo: this.repo,
      ref: `heads/${branch}`,
      request: this.requestOptions(),
    });
    return data.object.sha;
  }

  async createRef(branch: string, sha: string): Promise<CreateRefResult> {
    try {
      await this.octokit.rest.git.createRef({
        owner: this.owner,
        repo: this.repo,
        ref: `refs/heads/${branch}`,
        sha,
        request: this.requestOptions(),
      });
      return 'created';
    } catch (err) {
      if (extractStatusCode(err) === 422 && String(err).includes(REF_EXISTS_MESSAGE)) {
        return 'exists';
      }
      throw err;
    }
  }

  async getFileSha(path: string, branch: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref: branch,
        request: this.requestOptions(),
      });
      if (Array.isArray(data)) {
        throw new Error(`${path} is a directory on ${branch}`);
      }
      return data.sha;
    } catch (err) {
      if (extractStatusCode(err) === 404) {
        this.logger.debug(`No existing file at ${path} on ${branch}`);
        return null;
      }
      throw err;
    }
  }

  async putFile(params: PutFileParams): Promise<void> {
    await this.octokit.rest.repos.createOrUpdateFileContents({
      owner: this.owner,
      repo: this.repo,
      path: params.path,
      message: params.message,
      content: params.content,
      branch: params.branch,
      sha: params.sha,
      request: this.requestOptions(),
    });
  }

  // ── Private helpers ──

  private requestOptions(): { signal: AbortSignal } {
    return { signal: AbortSignal.timeout(this.timeoutMs) };
  }
}
