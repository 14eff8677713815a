/**
 * Bitbucket Server HTTP client -- typed wrapper around fetch for the REST 1.0 API.
 */

import { Agent, fetch as undiciFetch } from "undici";
import type { z } from "zod";
import { BitbucketApiError } from "../../errors.js";
import type {
  BranchApi,
  BranchRecord,
  ListBranchesOptions,
  ProjectDetails,
  RepositoryDetails,
} from "../../interfaces/branch-api.js";
import type { Logger } from "../../interfaces/logger.js";
import { noopLogger } from "../../utils/noop-logger.js";
import {
  branchPageSchema,
  type DeleteBranchRequest,
  errorResponseSchema,
  projectSchema,
  repositorySchema,
} from "./bitbucket-types.js";

export interface HttpRequestInit {
  method: "GET" | "DELETE";
  headers: Record<string, string>;
  body?: string;
}

/** The slice of a fetch Response the client reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface BitbucketHttpClientOptions {
  url: string;
  username: string;
  password: string;
  /** When false, self-signed and mismatched server certificates are accepted. */
  verifyTls?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}

const API_ROOT = "rest/api/1.0";
const BRANCH_UTILS_ROOT = "rest/branch-utils/1.0";

export function createFetch(verifyTls: boolean): FetchLike {
  const dispatcher = verifyTls
    ? undefined
    : new Agent({ connect: { rejectUnauthorized: false } });
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export class BitbucketHttpClient implements BranchApi {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  readonly verifyTls: boolean;

  constructor(options: BitbucketHttpClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    const encoded = Buffer.from(`${options.username}:${options.password}`).toString("base64");
    this.authHeader = `Basic ${encoded}`;
    this.verifyTls = options.verifyTls ?? true;
    this.fetchImpl = options.fetch ?? createFetch(this.verifyTls);
    this.logger = options.logger ?? noopLogger;
  }

  async getProject(projectKey: string): Promise<ProjectDetails> {
    const path = `${API_ROOT}/projects/${encodeURIComponent(projectKey)}`;
    return this.getJson(path, projectSchema);
  }

  async getRepository(projectKey: string, repositorySlug: string): Promise<RepositoryDetails> {
    return this.getJson(this.repoPath(API_ROOT, projectKey, repositorySlug), repositorySchema);
  }

  /** Fetches every page, following `nextPageStart` until the server reports the last page. */
  async getBranches(
    projectKey: string,
    repositorySlug: string,
    options: ListBranchesOptions = {},
  ): Promise<BranchRecord[]> {
    const path = `${this.repoPath(API_ROOT, projectKey, repositorySlug)}/branches`;
    const branches: BranchRecord[] = [];
    let start = 0;

    for (;;) {
      const query: Record<string, string> = { start: String(start) };
      if (options.limit !== undefined) query.limit = String(options.limit);
      if (options.filter) query.filterText = options.filter;
      if (options.details !== undefined) query.details = String(options.details);
      if (options.boostMatches !== undefined) query.boostMatches = String(options.boostMatches);

      const page = await this.getJson(path, branchPageSchema, query);
      branches.push(...page.values);

      if (page.isLastPage || page.nextPageStart === undefined) break;
      if (page.nextPageStart <= start) {
        // nextPageStart must move past the current start
        throw new BitbucketApiError(
          `Bitbucket API GET ${path} returned nextPageStart ${page.nextPageStart} at start ${start}`,
          200,
        );
      }
      start = page.nextPageStart;
    }

    return branches;
  }

  async deleteBranch(
    projectKey: string,
    repositorySlug: string,
    branchName: string,
    endPoint?: string,
  ): Promise<void> {
    const path = `${this.repoPath(BRANCH_UTILS_ROOT, projectKey, repositorySlug)}/branches`;
    const body: DeleteBranchRequest = { name: branchName };
    if (endPoint) body.endPoint = endPoint;
    await this.request("DELETE", path, undefined, JSON.stringify(body));
  }

  private repoPath(root: string, projectKey: string, repositorySlug: string): string {
    return `${root}/projects/${encodeURIComponent(projectKey)}/repos/${encodeURIComponent(repositorySlug)}`;
  }

  private async getJson<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    query?: Record<string, string>,
  ): Promise<z.output<T>> {
    const res = await this.request("GET", path, query);
    const text = await res.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new BitbucketApiError(`Bitbucket API GET ${path} returned invalid JSON`, res.status, {
        cause: err,
      });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new BitbucketApiError(
        `Bitbucket API GET ${path} returned an unexpected payload: ${parsed.error.message}`,
        res.status,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private async request(
    method: HttpRequestInit["method"],
    path: string,
    query?: Record<string, string>,
    body?: string,
  ): Promise<HttpResponse> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: this.authHeader,
    };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    this.logger.debug?.("Bitbucket request", { method, url: url.toString() });
    const res = await this.fetchImpl(url.toString(), { method, headers, body });

    if (!res.ok) {
      const errorText = await res.text().catch(() => "");
      throw new BitbucketApiError(
        `Bitbucket API ${method} ${path} failed: ${res.status} ${describeError(errorText, res.statusText)}`,
        res.status,
      );
    }

    return res;
  }
}

/** Prefer the server's own error message over the raw body. */
function describeError(text: string, statusText: string): string {
  if (!text) return statusText;
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text;
  }
  const parsed = errorResponseSchema.safeParse(body);
  if (!parsed.success) return text;
  return parsed.data.errors.map((e) => e.message ?? e.exceptionName ?? "").join("; ");
}
