import { generateBranchName } from "./branch-naming.js";
import type { BranchNamingConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { Branch, BranchHost, Issue, IssueTracker, Transition } from "./types.js";

export interface WorkflowResult {
  issue: Issue;
  branch?: Branch;
  message: string;
}

export interface CreateIssueAndBranchInput {
  summary: string;
  issueType?: string;
  description?: string;
  labels?: string[];
  transition?: string;
  ref?: string;
}

/** Single-shot operations behind the CLI commands. */
export class WorkflowService {
  constructor(
    private readonly tracker: IssueTracker,
    private readonly host: BranchHost | undefined,
    private readonly naming: BranchNamingConfig,
    private readonly projectKey: string
  ) {}

  async createBranchFromIssue(issueKey: string, ref?: string): Promise<WorkflowResult> {
    const issue = await this.tracker.getIssue(issueKey);
    const branch = await this.createBranch(issue, ref);

    return {
      issue,
      branch,
      message: `Branch '${branch.name}' created.`
    };
  }

  async createIssueAndBranch(input: CreateIssueAndBranchInput): Promise<WorkflowResult> {
    let issue = await this.tracker.createIssue({
      projectKey: this.projectKey,
      issueType: input.issueType ?? "Task",
      summary: input.summary,
      ...(input.description ? { description: input.description } : {}),
      ...(input.labels && input.labels.length > 0 ? { labels: input.labels } : {})
    });

    if (input.transition) {
      issue = await this.tracker.transitionIssue(issue.key, input.transition);
    }

    const branch = await this.createBranch(issue, input.ref);

    return {
      issue,
      branch,
      message: `Issue '${issue.key}' and branch '${branch.name}' created.`
    };
  }

  async transitionIssue(issueKey: string, status: string): Promise<WorkflowResult> {
    const issue = await this.tracker.transitionIssue(issueKey, status);

    return {
      issue,
      message: `Issue '${issueKey}' moved to '${issue.status}'.`
    };
  }

  async listTransitions(issueKey: string): Promise<Transition[]> {
    return this.tracker.getTransitions(issueKey);
  }

  async previewBranchName(issueKey: string): Promise<string> {
    const issue = await this.tracker.getIssue(issueKey);
    return generateBranchName(issue, this.naming);
  }

  private async createBranch(issue: Issue, ref: string | undefined): Promise<Branch> {
    if (!this.host) {
      throw new ConfigurationError("GitLab is not configured; set GITLAB_URL, GITLAB_TOKEN and GITLAB_PROJECT_ID.");
    }

    return this.host.createBranch({
      name: generateBranchName(issue, this.naming),
      issueKey: issue.key,
      ...(ref ? { ref } : {})
    });
  }
}
