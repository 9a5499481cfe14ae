import { generateBranchName } from "./branch-naming.js";
import type { BranchNamingConfig } from "./config.js";
import { AlreadyExistsError, formatError } from "./errors.js";
import type { Branch, BranchHost, Issue, IssueTracker } from "./types.js";

export type BranchOutcome =
  | { kind: "created"; issueKey: string; branchName: string; branch: Branch }
  | { kind: "skipped"; issueKey: string; branchName: string }
  | { kind: "planned"; issueKey: string; branchName: string }
  | { kind: "failed"; issueKey: string; branchName: string; error: string };

export interface BranchRunOptions {
  dryRun?: boolean;
  ref?: string;
  /** Checked before each issue by `ensureBranches`. */
  signal?: AbortSignal;
}

export interface BranchReport {
  outcomes: BranchOutcome[];
  created: number;
  planned: number;
  skipped: number;
  failed: number;
}

export class BranchWorkflow {
  constructor(
    private readonly tracker: IssueTracker,
    private readonly host: BranchHost,
    private readonly naming: BranchNamingConfig
  ) {}

  /** Target-project issues assigned to the caller and waiting in `readyStatus`. */
  async fetchReadyIssues(projectKey: string, readyStatus: string): Promise<Issue[]> {
    const status = readyStatus.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
    return this.tracker.searchIssues(
      `project = "${projectKey}" AND assignee = currentUser() AND status = "${status}" ORDER BY updated DESC`
    );
  }

  /** Create-or-skip: an existing branch, or one GitLab reports as taken, counts as done. */
  async ensureBranch(issue: Issue, options: BranchRunOptions = {}): Promise<BranchOutcome> {
    const branchName = generateBranchName(issue, this.naming);
    const base = { issueKey: issue.key, branchName };

    try {
      if (await this.host.branchExists(branchName)) {
        return { ...base, kind: "skipped" };
      }

      if (options.dryRun) {
        return { ...base, kind: "planned" };
      }

      const branch = await this.host.createBranch({
        name: branchName,
        issueKey: issue.key,
        ...(options.ref ? { ref: options.ref } : {})
      });
      return { ...base, kind: "created", branch };
    } catch (error) {
      if (error instanceof AlreadyExistsError) {
        return { ...base, kind: "skipped" };
      }

      return { ...base, kind: "failed", error: formatError(error) };
    }
  }

  async ensureBranches(issues: Issue[], options: BranchRunOptions = {}): Promise<BranchReport> {
    const outcomes: BranchOutcome[] = [];
    for (const issue of issues) {
      if (options.signal?.aborted) {
        break;
      }

      outcomes.push(await this.ensureBranch(issue, options));
    }

    const count = (kind: BranchOutcome["kind"]) =>
      outcomes.filter((outcome) => outcome.kind === kind).length;

    return {
      outcomes,
      created: count("created"),
      planned: count("planned"),
      skipped: count("skipped"),
      failed: count("failed")
    };
  }
}
