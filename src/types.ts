export interface Issue {
  key: string;
  summary: string;
  issueType: string;
  status: string;
  projectKey: string;
}

export interface Transition {
  id: string;
  name: string;
  toStatus: string;
}

export interface Branch {
  name: string;
  ref: string;
  issueKey: string;
  webUrl: string;
}

export interface LinkedIssueRef {
  key: string;
  direction: "outward" | "inward";
  linkTypeId: string | null;
  linkTypeName: string | null;
}

export interface CreateIssueInput {
  projectKey: string;
  issueType: string;
  summary: string;
  description?: string;
  labels?: string[];
  assigneeId?: string;
  parentKey?: string;
  fixVersionIds?: string[];
}

export interface LinkIssuesInput {
  linkType: string;
  inwardKey: string;
  outwardKey: string;
}

export interface CreateBranchInput {
  name: string;
  ref?: string;
  issueKey?: string;
}

/** The Jira surface the workflows depend on. `JiraClient` implements it; tests use fakes. */
export interface IssueTracker {
  getIssue(issueKey: string): Promise<Issue>;
  createIssue(input: CreateIssueInput): Promise<Issue>;
  getTransitions(issueKey: string): Promise<Transition[]>;
  transitionIssue(issueKey: string, status: string): Promise<Issue>;
  getIssueLinks(issueKey: string): Promise<LinkedIssueRef[]>;
  linkIssues(input: LinkIssuesInput): Promise<void>;
  searchIssues(jql: string, maxResults?: number): Promise<Issue[]>;
  findVersionId(projectKey: string, versionName: string): Promise<string | null>;
}

/** The GitLab surface the workflows depend on. */
export interface BranchHost {
  readonly defaultBranch: string;
  createBranch(input: CreateBranchInput): Promise<Branch>;
  branchExists(name: string): Promise<boolean>;
}

export function projectKeyOf(issueKey: string): string {
  const separator = issueKey.lastIndexOf("-");
  return separator > 0 ? issueKey.slice(0, separator) : issueKey;
}
