import type { DuplicationPolicy } from "./duplicate-detector.js";
import { formatError } from "./errors.js";
import type { Issue, IssueTracker } from "./types.js";

export interface TargetIssueOptions {
  projectKey: string;
  issueType: string;
  assigneeId?: string;
  parentKey?: string;
  fixVersion?: string;
}

export type SyncOutcome =
  | { kind: "skipped"; sourceKey: string; summary: string; targetKey: string }
  | {
      kind: "created";
      sourceKey: string;
      summary: string;
      targetKey: string;
      linked: boolean;
      linkError?: string;
      notes: string[];
    }
  | { kind: "failed"; sourceKey: string; summary: string; stage: "check" | "create"; error: string };

export interface SyncReport {
  outcomes: SyncOutcome[];
  created: number;
  skipped: number;
  failed: number;
}

export type SourceIssue = Pick<Issue, "key" | "summary">;

/**
 * Mirrors source issues into the target project. Every method returns
 * outcomes instead of logging; see `reporter.ts` for the printed form.
 */
export class SyncWorkflow {
  constructor(
    private readonly tracker: IssueTracker,
    private readonly policy: DuplicationPolicy,
    private readonly target: TargetIssueOptions,
    private readonly sourceJql: string
  ) {}

  async fetchCandidates(): Promise<Issue[]> {
    return this.tracker.searchIssues(this.sourceJql);
  }

  async syncIssue(source: SourceIssue): Promise<SyncOutcome> {
    const base = { sourceKey: source.key, summary: source.summary };

    // Checked right before creating, never from a batch-wide snapshot.
    let existing: string | null;
    try {
      existing = await this.policy.findExisting(source.key);
    } catch (error) {
      return { ...base, kind: "failed", stage: "check", error: formatError(error) };
    }

    if (existing) {
      return { ...base, kind: "skipped", targetKey: existing };
    }

    const notes: string[] = [];
    let targetKey: string;
    try {
      const fixVersionIds = await this.resolveFixVersionIds(notes);
      const created = await this.tracker.createIssue({
        projectKey: this.target.projectKey,
        issueType: this.target.issueType,
        summary: source.summary,
        description: `Synchronized from ${source.key}.`,
        labels: this.policy.labelsFor(source.key),
        fixVersionIds,
        ...(this.target.assigneeId ? { assigneeId: this.target.assigneeId } : {}),
        ...(this.target.parentKey ? { parentKey: this.target.parentKey } : {})
      });
      targetKey = created.key;
    } catch (error) {
      return { ...base, kind: "failed", stage: "create", error: formatError(error) };
    }

    // The new issue is kept even when the evidence cannot be written.
    try {
      await this.policy.record(source.key, targetKey);
    } catch (error) {
      return {
        ...base,
        kind: "created",
        targetKey,
        linked: false,
        linkError: formatError(error),
        notes
      };
    }

    return { ...base, kind: "created", targetKey, linked: true, notes };
  }

  /**
   * Syncs sequentially. `signal` is checked before each issue only, so an
   * issue whose target was created still gets its link.
   */
  async syncBatch(sources: SourceIssue[], signal?: AbortSignal): Promise<SyncReport> {
    const outcomes: SyncOutcome[] = [];
    for (const source of sources) {
      if (signal?.aborted) {
        break;
      }

      outcomes.push(await this.syncIssue(source));
    }

    return summarize(outcomes);
  }

  private async resolveFixVersionIds(notes: string[]): Promise<string[]> {
    const versionName = this.target.fixVersion;
    if (!versionName) {
      return [];
    }

    const versionId = await this.tracker.findVersionId(this.target.projectKey, versionName);
    if (!versionId) {
      notes.push(`Fix version '${versionName}' not found in ${this.target.projectKey}; created without it.`);
      return [];
    }

    return [versionId];
  }
}

export function summarize(outcomes: SyncOutcome[]): SyncReport {
  return {
    outcomes,
    created: outcomes.filter((outcome) => outcome.kind === "created").length,
    skipped: outcomes.filter((outcome) => outcome.kind === "skipped").length,
    failed: outcomes.filter((outcome) => outcome.kind === "failed").length
  };
}
