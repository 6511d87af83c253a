/**
 * Repository-contents operations needed to mirror a file onto a branch.
 * Implemented by the Octokit-backed GitHubAPI and by the raw REST client so
 * the uploader can fall back from one to the other.
 */
export interface ContentsTransport {
  /** Short name used in logs and outcomes. */
  readonly name: string;

  branchExists(branch: string): Promise<boolean>;
  getDefaultBranch(): Promise<string>;
  getBranchHeadSha(branch: string): Promise<string>;
  /** `'exists'` when another writer created the ref first. */
  createRef(branch: string, sha: string): Promise<CreateRefResult>;
  /** Current blob sha of a file on a branch, or null when absent. */
  getFileSha(path: string, branch: string): Promise<string | null>;
  putFile(params: PutFileParams): Promise<void>;
}

export type CreateRefResult = 'created' | 'exists';

export interface PutFileParams {
  path: string;
  /** Base64-encoded file content. */
  content: string;
  message: string;
  branch: string;
  /** Version token of the file being replaced; omit to create. */
  sha?: string;
}

export const REF_EXISTS_MESSAGE = 'Reference already exists';

export function encodeContentPath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}
