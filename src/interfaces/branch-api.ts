/**
 * Remote code-hosting operations the cleaner consumes.
 * The Bitbucket adapter implements this over HTTP; tests use an in-memory fake.
 * @module
 */

/** A branch as returned by the hosting service. Unknown fields are carried through. */
export interface BranchRecord {
  id?: string;
  displayId: string;
  isDefault: boolean;
  [key: string]: unknown;
}

export interface ListBranchesOptions {
  filter?: string;
  /** Page size requested from the service. */
  limit?: number;
  details?: boolean;
  boostMatches?: boolean;
}

export type ProjectDetails = Record<string, unknown>;
export type RepositoryDetails = Record<string, unknown>;

export interface BranchApi {
  getProject(projectKey: string): Promise<ProjectDetails>;
  getRepository(projectKey: string, repositorySlug: string): Promise<RepositoryDetails>;
  getBranches(
    projectKey: string,
    repositorySlug: string,
    options?: ListBranchesOptions,
  ): Promise<BranchRecord[]>;
  deleteBranch(
    projectKey: string,
    repositorySlug: string,
    branchName: string,
    endPoint?: string,
  ): Promise<void>;
}
