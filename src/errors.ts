export class GitHubRequestError extends Error {
  status: number;
  method: string;
  url: string;

  constructor(message: string, status: number, method: string, url: string) {
    super(message);
    this.name = 'GitHubRequestError';
    this.status = status;
    this.method = method;
    this.url = url;
  }
}

export class TemplateNotFoundError extends Error {
  templateName: string;
  templatePath: string;

  constructor(message: string, templateName: string, templatePath: string) {
    super(message);
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
    this.templatePath = templatePath;
  }
}

export class InputLoadError extends Error {
  filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'InputLoadError';
    this.filePath = filePath;
  }
}

export class BranchUnavailableError extends Error {
  branch: string;

  constructor(message: string, branch: string) {
    super(message);
    this.name = 'BranchUnavailableError';
    this.branch = branch;
  }
}

export class PublishFailedError extends Error {
  title: string;

  constructor(message: string, title: string) {
    super(message);
    this.name = 'PublishFailedError';
    this.title = title;
  }
}

/**
 * Pull an HTTP status code off an error thrown by Octokit or the REST client.
 */
export function extractStatusCode(err: unknown): number | undefined {
  if (err instanceof GitHubRequestError) return err.status;
  if (err && typeof err === 'object') {
    if ('status' in err && typeof err.status === 'number') return err.status;
    if ('response' in err && err.response && typeof err.response === 'object') {
      const response = err.response;
      if ('status' in response && typeof response.status === 'number') return response.status;
    }
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
