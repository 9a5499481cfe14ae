import type { SyncConfig } from "./config.js";
import type { IssueTracker } from "./types.js";

/**
 * How a deployment proves a source issue was already synchronized. Exactly
 * one policy is active per run; link and label evidence are not
 * interchangeable, since a link made by one pathway is invisible to a label
 * scan and vice versa.
 */
export interface DuplicationPolicy {
  readonly kind: "link" | "label";
  /** Read-only lookup of the target issue that already mirrors `sourceKey`. */
  findExisting(sourceKey: string): Promise<string | null>;
  /** Labels the new target issue must carry for this policy to find it later. */
  labelsFor(sourceKey: string): string[];
  /** Persist the evidence after the target issue exists. Rejects when it could not be recorded. */
  record(sourceKey: string, targetKey: string): Promise<void>;
}

export interface LinkPolicyOptions {
  targetProject: string;
  linkType: string;
}

export class LinkDuplicationPolicy implements DuplicationPolicy {
  readonly kind = "link";

  constructor(
    private readonly tracker: IssueTracker,
    private readonly options: LinkPolicyOptions
  ) {}

  async findExisting(sourceKey: string): Promise<string | null> {
    const links = await this.tracker.getIssueLinks(sourceKey);
    const targetPrefix = `${this.options.targetProject}-`;

    const match = links.find(
      (link) =>
        link.direction === "outward" &&
        link.key.startsWith(targetPrefix) &&
        this.matchesLinkType(link.linkTypeId, link.linkTypeName)
    );

    return match?.key ?? null;
  }

  labelsFor(): string[] {
    return [];
  }

  async record(sourceKey: string, targetKey: string): Promise<void> {
    await this.tracker.linkIssues({
      linkType: this.options.linkType,
      inwardKey: sourceKey,
      outwardKey: targetKey
    });
  }

  private matchesLinkType(linkTypeId: string | null, linkTypeName: string | null): boolean {
    const expected = this.options.linkType.trim();
    return (
      linkTypeId === expected ||
      (linkTypeName !== null && linkTypeName.toLowerCase() === expected.toLowerCase())
    );
  }
}

export interface LabelPolicyOptions {
  targetProject: string;
  labelPrefix: string;
}

export class LabelDuplicationPolicy implements DuplicationPolicy {
  readonly kind = "label";

  constructor(
    private readonly tracker: IssueTracker,
    private readonly options: LabelPolicyOptions
  ) {}

  async findExisting(sourceKey: string): Promise<string | null> {
    const label = this.labelFor(sourceKey);
    const issues = await this.tracker.searchIssues(
      `project = ${quoteJql(this.options.targetProject)} AND labels = ${quoteJql(label)} ORDER BY created ASC`,
      1
    );

    return issues[0]?.key ?? null;
  }

  labelsFor(sourceKey: string): string[] {
    return [this.labelFor(sourceKey)];
  }

  /** The label travels with the create request, so nothing is left to write. */
  async record(): Promise<void> {}

  labelFor(sourceKey: string): string {
    return `${this.options.labelPrefix}${sourceKey}`;
  }
}

export function createDuplicationPolicy(
  tracker: IssueTracker,
  targetProject: string,
  config: Pick<SyncConfig, "duplicatePolicy" | "linkType" | "labelPrefix">
): DuplicationPolicy {
  if (config.duplicatePolicy === "label") {
    return new LabelDuplicationPolicy(tracker, {
      targetProject,
      labelPrefix: config.labelPrefix
    });
  }

  return new LinkDuplicationPolicy(tracker, {
    targetProject,
    linkType: config.linkType
  });
}

function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
