import * as z from "zod/v4";
import type { GitLabConfig } from "./config.js";
import { AlreadyExistsError, ApiError, NotFoundError } from "./errors.js";
import { isAbortError, safeReadBody } from "./jira-client.js";
import type { Branch, BranchHost, CreateBranchInput } from "./types.js";

const branchResponseSchema = z.object({
  name: z.string(),
  web_url: z.string().optional()
});

export class GitLabClient implements BranchHost {
  constructor(private readonly config: GitLabConfig) {}

  get defaultBranch(): string {
    return this.config.defaultBranch;
  }

  /** Throws AlreadyExistsError when GitLab rejects the name as taken. */
  async createBranch(input: CreateBranchInput): Promise<Branch> {
    const ref = input.ref?.trim() || this.config.defaultBranch;

    let payload: unknown;
    try {
      payload = await this.request<unknown>("/repository/branches", {
        method: "POST",
        body: JSON.stringify({ branch: input.name, ref })
      });
    } catch (error) {
      if (
        error instanceof ApiError &&
        error.status === 400 &&
        error.body.toLowerCase().includes("already exists")
      ) {
        throw new AlreadyExistsError(input.name);
      }

      throw error;
    }

    const parsed = branchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ApiError(`Unexpected GitLab branch response for ${input.name}`, "gitlab", null);
    }

    return {
      name: parsed.data.name,
      ref,
      issueKey: input.issueKey ?? "",
      webUrl: parsed.data.web_url ?? ""
    };
  }

  async branchExists(name: string): Promise<boolean> {
    try {
      await this.request<unknown>(`/repository/branches/${encodeURIComponent(name)}`);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }

      throw error;
    }
  }

  private async request<T>(path: string, init: RequestInit = {}): Promise<T> {
    const url = new URL(
      `/api/v4/projects/${encodeURIComponent(this.config.projectId)}${path}`,
      `${this.config.baseUrl}/`
    );
    const headers = new Headers(init.headers);
    const method = init.method ?? "GET";

    headers.set("Accept", "application/json");
    headers.set("PRIVATE-TOKEN", this.config.token);

    if (init.body !== undefined && !headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json");
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          ...init,
          headers,
          signal: controller.signal
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }

        throw new ApiError(
          `GitLab API connection failed: ${method} ${url.pathname}: ${error instanceof Error ? error.message : String(error)}`,
          "gitlab",
          null
        );
      }

      if (!response.ok) {
        const body = await safeReadBody(response);
        const message = `${method} ${url.pathname} failed with ${response.status} ${response.statusText}`;

        if (response.status === 404) {
          throw new NotFoundError(message, "gitlab", body);
        }

        throw new ApiError(message, "gitlab", response.status, body);
      }

      return (await response.json()) as T;
    } catch (error) {
      if (isAbortError(error)) {
        throw new ApiError(
          `GitLab API request timed out after ${this.config.requestTimeoutMs}ms: ${method} ${url.pathname}`,
          "gitlab",
          null
        );
      }

      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
