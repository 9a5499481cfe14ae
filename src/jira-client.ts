import { plainTextToAdf } from "./adf.js";
import type { JiraConfig } from "./config.js";
import { ApiError, AppError, NotFoundError, TransitionNotFoundError } from "./errors.js";
import {
  projectKeyOf,
  type CreateIssueInput,
  type Issue,
  type IssueTracker,
  type LinkIssuesInput,
  type LinkedIssueRef,
  type Transition
} from "./types.js";

const ISSUE_FIELDS = ["summary", "issuetype", "status"];

interface JiraIssueResponse {
  key: string;
  fields?: Record<string, unknown>;
}

interface JiraProjectResponse {
  issueTypes?: Array<{
    id?: string;
    name?: string;
  }>;
}

interface JiraVersion {
  id?: string;
  name?: string;
}

interface JiraTransition {
  id?: string;
  name?: string;
  to?: {
    name?: string;
  };
}

interface JiraTransitionResponse {
  transitions?: JiraTransition[];
}

interface JiraEnhancedSearchResponse {
  issues?: JiraIssueResponse[];
}

interface JiraLegacySearchResponse {
  issues?: JiraIssueResponse[];
}

/**
 * Version ids are immutable reference data, so lookups are cached for the
 * lifetime of the client and never invalidated. Misses are cached too.
 */
export class VersionCache {
  private readonly entries = new Map<string, string | null>();

  get(projectKey: string, versionName: string): string | null | undefined {
    return this.entries.get(this.keyOf(projectKey, versionName));
  }

  set(projectKey: string, versionName: string, versionId: string | null): void {
    this.entries.set(this.keyOf(projectKey, versionName), versionId);
  }

  get size(): number {
    return this.entries.size;
  }

  private keyOf(projectKey: string, versionName: string): string {
    return `${projectKey.toUpperCase()}\u0000${versionName}`;
  }
}

export class JiraClient implements IssueTracker {
  constructor(
    private readonly config: JiraConfig,
    private readonly versions: VersionCache = new VersionCache()
  ) {}

  async getIssue(issueKey: string): Promise<Issue> {
    const query = new URLSearchParams({ fields: ISSUE_FIELDS.join(",") });

    const issue = await this.request<JiraIssueResponse>(
      `/rest/api/3/issue/${encodeURIComponent(issueKey)}?${query.toString()}`
    );

    return this.toIssue(issue);
  }

  async createIssue(input: CreateIssueInput): Promise<Issue> {
    const issueTypeId = await this.resolveIssueTypeId(input.projectKey, input.issueType);

    const fields: Record<string, unknown> = {
      project: { key: input.projectKey },
      issuetype: { id: issueTypeId },
      summary: input.summary
    };

    if (input.description) {
      fields.description = plainTextToAdf(input.description);
    }

    if (input.labels && input.labels.length > 0) {
      fields.labels = input.labels;
    }

    if (input.assigneeId) {
      fields.assignee = { accountId: input.assigneeId };
    }

    if (input.parentKey) {
      fields.parent = { key: input.parentKey };
    }

    if (input.fixVersionIds && input.fixVersionIds.length > 0) {
      fields.fixVersions = input.fixVersionIds.map((id) => ({ id }));
    }

    const created = await this.request<{ key: string }>("/rest/api/3/issue", {
      method: "POST",
      body: JSON.stringify({ fields })
    });

    // The issue exists from here on; a failed re-read must not hide its key.
    try {
      return await this.getIssue(created.key);
    } catch (error) {
      if (!(error instanceof ApiError)) {
        throw error;
      }

      return {
        key: created.key,
        summary: input.summary,
        issueType: input.issueType,
        status: "",
        projectKey: projectKeyOf(created.key)
      };
    }
  }

  async getTransitions(issueKey: string): Promise<Transition[]> {
    const response = await this.request<JiraTransitionResponse>(
      `/rest/api/3/issue/${encodeURIComponent(issueKey)}/transitions`
    );

    const transitions: Transition[] = [];
    for (const transition of response.transitions ?? []) {
      const id = this.normalizeString(transition.id);
      const name = this.normalizeString(transition.name);
      if (!id || !name) {
        continue;
      }

      transitions.push({
        id,
        name,
        toStatus: this.normalizeString(transition.to?.name) ?? ""
      });
    }

    return transitions;
  }

  /**
   * Applies the transition whose name, target status or id matches `status`
   * case-insensitively, then re-reads the issue.
   */
  async transitionIssue(issueKey: string, status: string): Promise<Issue> {
    const requested = status.trim();
    const transitions = await this.getTransitions(issueKey);
    const normalizedRequested = requested.toLowerCase();

    const matched = transitions.find(
      (transition) =>
        transition.name.toLowerCase() === normalizedRequested ||
        transition.toStatus.toLowerCase() === normalizedRequested ||
        transition.id === requested
    );

    if (!matched) {
      throw new TransitionNotFoundError(
        issueKey,
        requested,
        transitions.map((transition) => transition.name)
      );
    }

    await this.request<void>(`/rest/api/3/issue/${encodeURIComponent(issueKey)}/transitions`, {
      method: "POST",
      body: JSON.stringify({
        transition: {
          id: matched.id
        }
      })
    });

    return this.getIssue(issueKey);
  }

  async getIssueLinks(issueKey: string): Promise<LinkedIssueRef[]> {
    const query = new URLSearchParams({ fields: "issuelinks" });

    const issue = await this.request<JiraIssueResponse>(
      `/rest/api/3/issue/${encodeURIComponent(issueKey)}?${query.toString()}`
    );

    return this.extractLinkedIssues(issue.fields?.issuelinks);
  }

  async linkIssues(input: LinkIssuesInput): Promise<void> {
    const linkType = input.linkType.trim();

    await this.request<void>("/rest/api/3/issueLink", {
      method: "POST",
      body: JSON.stringify({
        type: /^\d+$/.test(linkType) ? { id: linkType } : { name: linkType },
        inwardIssue: {
          key: input.inwardKey
        },
        outwardIssue: {
          key: input.outwardKey
        }
      })
    });
  }

  async searchIssues(jql: string, maxResults = 100): Promise<Issue[]> {
    try {
      const response = await this.request<JiraEnhancedSearchResponse>("/rest/api/3/search/jql", {
        method: "POST",
        body: JSON.stringify({
          jql,
          maxResults,
          fields: ISSUE_FIELDS
        })
      });

      return (response.issues ?? []).map((issue) => this.toIssue(issue));
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }

      const response = await this.request<JiraLegacySearchResponse>("/rest/api/3/search", {
        method: "POST",
        body: JSON.stringify({
          jql,
          maxResults,
          startAt: 0,
          fields: ISSUE_FIELDS
        })
      });

      return (response.issues ?? []).map((issue) => this.toIssue(issue));
    }
  }

  async findVersionId(projectKey: string, versionName: string): Promise<string | null> {
    const cached = this.versions.get(projectKey, versionName);
    if (cached !== undefined) {
      return cached;
    }

    const versions = await this.request<JiraVersion[]>(
      `/rest/api/3/project/${encodeURIComponent(projectKey)}/versions`
    );

    const match = versions.find((version) => version.name === versionName);
    const versionId = this.normalizeString(match?.id) ?? null;
    this.versions.set(projectKey, versionName, versionId);
    return versionId;
  }

  private async resolveIssueTypeId(projectKey: string, requested: string): Promise<string> {
    const project = await this.request<JiraProjectResponse>(
      `/rest/api/3/project/${encodeURIComponent(projectKey)}`
    );

    const normalized = requested.trim().toLowerCase();

    const match = (project.issueTypes ?? []).find((issueType) => {
      const id = issueType.id?.trim();
      const name = issueType.name?.trim().toLowerCase();
      return id === requested.trim() || name === normalized;
    });

    if (!match?.id) {
      const available = (project.issueTypes ?? [])
        .map((issueType) => issueType.name)
        .filter((value): value is string => Boolean(value))
        .join(", ");

      throw new AppError(
        `Unknown issue type '${requested}' for project ${projectKey}. Available: ${available || "(none)"}.`
      );
    }

    return match.id;
  }

  private toIssue(issue: JiraIssueResponse): Issue {
    const fields = issue.fields ?? {};

    return {
      key: issue.key,
      summary: this.normalizeString(fields.summary) ?? "",
      issueType: this.readName(fields.issuetype) ?? "",
      status: this.readName(fields.status) ?? "",
      projectKey: projectKeyOf(issue.key)
    };
  }

  private extractLinkedIssues(value: unknown): LinkedIssueRef[] {
    if (!Array.isArray(value)) {
      return [];
    }

    const linkedIssues: LinkedIssueRef[] = [];

    for (const entry of value) {
      if (!isRecord(entry)) {
        continue;
      }

      const linkType = isRecord(entry.type) ? entry.type : undefined;
      const linkTypeId = this.normalizeString(linkType?.id) ?? null;
      const linkTypeName = this.normalizeString(linkType?.name) ?? null;

      const outwardKey = isRecord(entry.outwardIssue)
        ? this.normalizeString(entry.outwardIssue.key)
        : undefined;
      if (outwardKey) {
        linkedIssues.push({ key: outwardKey, direction: "outward", linkTypeId, linkTypeName });
      }

      const inwardKey = isRecord(entry.inwardIssue)
        ? this.normalizeString(entry.inwardIssue.key)
        : undefined;
      if (inwardKey) {
        linkedIssues.push({ key: inwardKey, direction: "inward", linkTypeId, linkTypeName });
      }
    }

    return linkedIssues;
  }

  private readName(value: unknown): string | undefined {
    return isRecord(value) ? this.normalizeString(value.name) : undefined;
  }

  private normalizeString(value: unknown): string | undefined {
    if (typeof value !== "string") {
      return undefined;
    }

    const normalized = value.trim();
    return normalized.length > 0 ? normalized : undefined;
  }

  private async request<T>(path: string, init: RequestInit = {}): Promise<T> {
    const url = new URL(path, `${this.config.baseUrl}/`);
    const headers = new Headers(init.headers);
    const method = init.method ?? "GET";

    headers.set("Accept", "application/json");
    headers.set("Authorization", this.config.authHeader);

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
          `Jira API connection failed: ${method} ${url.pathname}: ${error instanceof Error ? error.message : String(error)}`,
          "jira",
          null
        );
      }

      if (!response.ok) {
        const body = await safeReadBody(response);
        const message = `${method} ${url.pathname} failed with ${response.status} ${response.statusText}`;

        if (response.status === 404) {
          throw new NotFoundError(message, "jira", body);
        }

        throw new ApiError(message, "jira", response.status, body);
      }

      if (response.status === 204) {
        return undefined as T;
      }

      const text = await response.text();
      if (!text.trim()) {
        return undefined as T;
      }

      return JSON.parse(text) as T;
    } catch (error) {
      if (isAbortError(error)) {
        throw new ApiError(
          `Jira API request timed out after ${this.config.requestTimeoutMs}ms: ${method} ${url.pathname}`,
          "jira",
          null
        );
      }

      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

export async function safeReadBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, 4_000);
  } catch {
    return "";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof DOMException && error.name === "AbortError";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
