import { AlreadyExistsError, ApiError, NotFoundError, TransitionNotFoundError } from "./errors.js";
import type { Logger, LogLevel } from "./logger.js";
import {
  projectKeyOf,
  type Branch,
  type BranchHost,
  type CreateBranchInput,
  type CreateIssueInput,
  type Issue,
  type IssueTracker,
  type LinkIssuesInput,
  type LinkedIssueRef,
  type Transition
} from "./types.js";

export function makeIssue(overrides: Partial<Issue> & { key: string }): Issue {
  return {
    summary: "Fix login error",
    issueType: "Task",
    status: "To Do",
    projectKey: projectKeyOf(overrides.key),
    ...overrides
  };
}

interface StoredLink {
  linkType: string;
  inwardKey: string;
  outwardKey: string;
}

/** In-memory tracker. Every mutating call is appended to `writes`. */
export class FakeTracker implements IssueTracker {
  readonly issues = new Map<string, Issue & { labels: string[] }>();
  readonly links: StoredLink[] = [];
  readonly writes: string[] = [];
  readonly transitions = new Map<string, Transition[]>();
  readonly versions = new Map<string, string>();
  readonly createInputs: CreateIssueInput[] = [];
  searchResults: Issue[] = [];
  searchQueries: string[] = [];
  failCreate = false;
  failLink = false;
  failSearch = false;
  private nextNumber = 1;

  add(issue: Issue, labels: string[] = []): void {
    this.issues.set(issue.key, { ...issue, labels });
  }

  async getIssue(issueKey: string): Promise<Issue> {
    const issue = this.issues.get(issueKey);
    if (!issue) {
      throw new NotFoundError(`GET /rest/api/3/issue/${issueKey} failed with 404 Not Found`, "jira");
    }

    const { labels: _labels, ...rest } = issue;
    return rest;
  }

  async createIssue(input: CreateIssueInput): Promise<Issue> {
    this.writes.push(`createIssue:${input.summary}`);
    this.createInputs.push(input);
    if (this.failCreate) {
      throw new ApiError("POST /rest/api/3/issue failed with 400 Bad Request", "jira", 400);
    }

    const issue: Issue = {
      key: `${input.projectKey}-${this.nextNumber++}`,
      summary: input.summary,
      issueType: input.issueType,
      status: "To Do",
      projectKey: input.projectKey
    };
    this.add(issue, input.labels ?? []);
    return issue;
  }

  async getTransitions(issueKey: string): Promise<Transition[]> {
    return this.transitions.get(issueKey) ?? [];
  }

  async transitionIssue(issueKey: string, status: string): Promise<Issue> {
    const available = await this.getTransitions(issueKey);
    const matched = available.find(
      (transition) =>
        transition.name.toLowerCase() === status.toLowerCase() ||
        transition.toStatus.toLowerCase() === status.toLowerCase()
    );
    if (!matched) {
      throw new TransitionNotFoundError(issueKey, status, available.map((transition) => transition.name));
    }

    this.writes.push(`transition:${issueKey}:${matched.id}`);
    const issue = this.issues.get(issueKey);
    if (issue) {
      issue.status = matched.toStatus;
    }
    return this.getIssue(issueKey);
  }

  async getIssueLinks(issueKey: string): Promise<LinkedIssueRef[]> {
    return this.links.flatMap((link): LinkedIssueRef[] => {
      if (link.inwardKey === issueKey) {
        return [{ key: link.outwardKey, direction: "outward", linkTypeId: null, linkTypeName: link.linkType }];
      }
      if (link.outwardKey === issueKey) {
        return [{ key: link.inwardKey, direction: "inward", linkTypeId: null, linkTypeName: link.linkType }];
      }
      return [];
    });
  }

  async linkIssues(input: LinkIssuesInput): Promise<void> {
    this.writes.push(`link:${input.inwardKey}->${input.outwardKey}`);
    if (this.failLink) {
      throw new ApiError("POST /rest/api/3/issueLink failed with 400 Bad Request", "jira", 400);
    }

    this.links.push({ ...input });
  }

  async searchIssues(jql: string): Promise<Issue[]> {
    this.searchQueries.push(jql);
    if (this.failSearch) {
      throw new ApiError("Jira API request timed out after 30000ms: POST /rest/api/3/search/jql", "jira", null);
    }

    const labelMatch = /labels = "([^"]+)"/.exec(jql);
    if (labelMatch) {
      const label = labelMatch[1];
      return [...this.issues.values()]
        .filter((issue) => label !== undefined && issue.labels.includes(label))
        .map(({ labels: _labels, ...issue }) => issue);
    }

    return this.searchResults;
  }

  async findVersionId(projectKey: string, versionName: string): Promise<string | null> {
    return this.versions.get(`${projectKey}:${versionName}`) ?? null;
  }
}

export class FakeBranchHost implements BranchHost {
  readonly defaultBranch = "develop";
  readonly existing = new Set<string>();
  readonly created: Branch[] = [];
  /** Names that `branchExists` misses but `createBranch` rejects, as in a race. */
  readonly racing = new Set<string>();
  failWith?: Error;

  async createBranch(input: CreateBranchInput): Promise<Branch> {
    if (this.failWith) {
      throw this.failWith;
    }
    if (this.existing.has(input.name) || this.racing.has(input.name)) {
      throw new AlreadyExistsError(input.name);
    }

    const branch: Branch = {
      name: input.name,
      ref: input.ref ?? this.defaultBranch,
      issueKey: input.issueKey ?? "",
      webUrl: `https://gitlab.example.com/group/app/-/tree/${input.name}`
    };
    this.existing.add(input.name);
    this.created.push(branch);
    return branch;
  }

  async branchExists(name: string): Promise<boolean> {
    return this.existing.has(name);
  }
}

export interface MemoryLogger extends Logger {
  lines: string[];
}

/** Collects `LEVEL message` lines without timestamps. */
export function memoryLogger(): MemoryLogger {
  const lines: string[] = [];
  const push = (level: LogLevel) => (message: string) => {
    lines.push(`${level} ${message}`);
  };

  return {
    lines,
    debug: push("DEBUG"),
    info: push("INFO"),
    skip: push("SKIP"),
    ok: push("OK"),
    warn: push("WARN"),
    error: push("ERROR")
  };
}
