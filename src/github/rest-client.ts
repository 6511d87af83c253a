import { z } from 'zod';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/schema.js';
import { GitHubRequestError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import {
  REF_EXISTS_MESSAGE,
  encodeContentPath,
  type ContentsTransport,
  type CreateRefResult,
  type PutFileParams,
} from './contents.js';

export interface GitHubRestClientOptions {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
}

const RepositorySchema = z.object({ default_branch: z.string() });
const RefSchema = z.object({ object: z.object({ sha: z.string() }) });
const ContentSchema = z.object({ sha: z.string() });

/**
 * Direct REST transport for repository contents, used when the Octokit path
 * fails. Plain `fetch` with a token header and a per-request timeout.
 */
export class GitHubRestClient implements ContentsTransport {
  readonly name = 'rest';

  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(
    private readonly repository: string,
    private readonly logger: Logger,
    options: GitHubRestClientOptions,
  ) {
    const apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.baseUrl = `${apiUrl}/repos/${repository}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = {
      Authorization: `token ${options.token}`,
      Accept: 'application/vnd.github+json',
      'User-Agent': 'vuln-issue-bridge',
    };
  }

  async branchExists(branch: string): Promise<boolean> {
    const response = await this.send('GET', `/branches/${encodeURIComponent(branch)}`);
    if (response.status === 404) return false;
    await this.ensureOk(response, 'GET', `/branches/${branch}`);
    return true;
  }

  async getDefaultBranch(): Promise<string> {
    const data = await this.getJson('', RepositorySchema);
    return data.default_branch;
  }

  async getBranchHeadSha(branch: string): Promise<string> {
    const data = await this.getJson(`/git/ref/heads/${encodeURIComponent(branch)}`, RefSchema);
    return data.object.sha;
  }

  async createRef(branch: string, sha: string): Promise<CreateRefResult> {
    const response = await this.send('POST', '/git/refs', { ref: `refs/heads/${branch}`, sha });
    if (response.status === 422) {
      const text = await response.text();
      if (text.includes(REF_EXISTS_MESSAGE)) return 'exists';
      throw this.requestError(response.status, 'POST', '/git/refs', text);
    }
    await this.ensureOk(response, 'POST', '/git/refs');
    return 'created';
  }

  async getFileSha(path: string, branch: string): Promise<string | null> {
    const endpoint = `/contents/${encodeContentPath(path)}?ref=${encodeURIComponent(branch)}`;
    const response = await this.send('GET', endpoint);
    if (response.status === 404) return null;
    await this.ensureOk(response, 'GET', endpoint);
    const parsed = ContentSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${path} on ${branch} is not a file`);
    }
    return parsed.data.sha;
  }

  async putFile(params: PutFileParams): Promise<void> {
    const endpoint = `/contents/${encodeContentPath(params.path)}`;
    const payload: Record<string, string> = {
      message: params.message,
      content: params.content,
      branch: params.branch,
    };
    if (params.sha) {
      payload.sha = params.sha;
    }
    const response = await this.send('PUT', endpoint, payload);
    await this.ensureOk(response, 'PUT', endpoint);
  }

  // ── Private helpers ──

  private async send(method: string, endpoint: string, body?: unknown): Promise<Response> {
    this.logger.debug(`${method} ${this.repository}${endpoint}`);
    return globalThis.fetch(`${this.baseUrl}${endpoint}`, {
      method,
      headers: body === undefined ? this.headers : { ...this.headers, 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  private async getJson<T>(endpoint: string, schema: z.ZodType<T>): Promise<T> {
    const response = await this.send('GET', endpoint);
    await this.ensureOk(response, 'GET', endpoint);
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected response from GET ${endpoint || '/'}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async ensureOk(response: Response, method: string, endpoint: string): Promise<void> {
    if (response.ok) return;
    throw this.requestError(response.status, method, endpoint, await response.text());
  }

  private requestError(status: number, method: string, endpoint: string, text: string): GitHubRequestError {
    const url = `${this.baseUrl}${endpoint}`;
    return new GitHubRequestError(`GitHub API error: ${status} ${method} ${url}: ${text}`, status, method, url);
  }
}
