import { describe, expect, it, vi } from "vitest";
import {
  createDuplicationPolicy,
  LabelDuplicationPolicy,
  LinkDuplicationPolicy
} from "./duplicate-detector.js";
import { FakeTracker, makeIssue } from "./test-support.js";

describe("LinkDuplicationPolicy", () => {
  const options = { targetProject: "SSCVE", linkType: "Relates" };

  it("finds a target-project issue linked outward with the configured type", async () => {
    const tracker = new FakeTracker();
    tracker.links.push({ linkType: "Relates", inwardKey: "INTQA-1", outwardKey: "SSCVE-9" });

    await expect(new LinkDuplicationPolicy(tracker, options).findExisting("INTQA-1")).resolves.toBe("SSCVE-9");
  });

  it("ignores links of another type, to another project or in the other direction", async () => {
    const tracker = new FakeTracker();
    tracker.links.push({ linkType: "Blocks", inwardKey: "INTQA-1", outwardKey: "SSCVE-2" });
    tracker.links.push({ linkType: "Relates", inwardKey: "INTQA-1", outwardKey: "OTHER-3" });
    tracker.links.push({ linkType: "Relates", inwardKey: "SSCVE-4", outwardKey: "INTQA-1" });
    // "SSCVE2-" shares a prefix with "SSCVE" but is a different project.
    tracker.links.push({ linkType: "Relates", inwardKey: "INTQA-1", outwardKey: "SSCVE2-5" });

    await expect(new LinkDuplicationPolicy(tracker, options).findExisting("INTQA-1")).resolves.toBeNull();
  });

  it("matches the link type by id or by name ignoring case", async () => {
    const tracker = new FakeTracker();
    vi.spyOn(tracker, "getIssueLinks").mockResolvedValue([
      { key: "SSCVE-7", direction: "outward", linkTypeId: "10003", linkTypeName: "Relates" }
    ]);

    await expect(
      new LinkDuplicationPolicy(tracker, { targetProject: "SSCVE", linkType: "10003" }).findExisting("INTQA-1")
    ).resolves.toBe("SSCVE-7");
    await expect(
      new LinkDuplicationPolicy(tracker, { targetProject: "SSCVE", linkType: "relates" }).findExisting("INTQA-1")
    ).resolves.toBe("SSCVE-7");
  });

  it("records the source as the inward side of the link", async () => {
    const tracker = new FakeTracker();
    const policy = new LinkDuplicationPolicy(tracker, options);

    await policy.record("INTQA-1", "SSCVE-9");

    expect(tracker.writes).toEqual(["link:INTQA-1->SSCVE-9"]);
    expect(tracker.links).toEqual([{ linkType: "Relates", inwardKey: "INTQA-1", outwardKey: "SSCVE-9" }]);
    expect(policy.labelsFor()).toEqual([]);
  });

  it("propagates a failed link write", async () => {
    const tracker = new FakeTracker();
    tracker.failLink = true;

    await expect(new LinkDuplicationPolicy(tracker, options).record("INTQA-1", "SSCVE-9")).rejects.toThrow(
      "POST /rest/api/3/issueLink failed with 400 Bad Request"
    );
  });
});

describe("LabelDuplicationPolicy", () => {
  const options = { targetProject: "SSCVE", labelPrefix: "intqa-sync-" };

  it("searches the target project for the source label", async () => {
    const tracker = new FakeTracker();
    tracker.add(makeIssue({ key: "SSCVE-4" }), ["intqa-sync-INTQA-1"]);

    const policy = new LabelDuplicationPolicy(tracker, options);

    await expect(policy.findExisting("INTQA-1")).resolves.toBe("SSCVE-4");
    expect(tracker.searchQueries).toEqual([
      'project = "SSCVE" AND labels = "intqa-sync-INTQA-1" ORDER BY created ASC'
    ]);
  });

  it("returns null when no issue carries the label", async () => {
    const tracker = new FakeTracker();
    tracker.add(makeIssue({ key: "SSCVE-4" }), ["intqa-sync-INTQA-2"]);

    await expect(new LabelDuplicationPolicy(tracker, options).findExisting("INTQA-1")).resolves.toBeNull();
  });

  it("puts the label on the new issue and writes nothing afterwards", async () => {
    const tracker = new FakeTracker();
    const policy = new LabelDuplicationPolicy(tracker, options);

    expect(policy.labelsFor("INTQA-1")).toEqual(["intqa-sync-INTQA-1"]);
    await policy.record();
    expect(tracker.writes).toEqual([]);
  });
});

describe("createDuplicationPolicy", () => {
  it("builds the configured policy", () => {
    const tracker = new FakeTracker();
    const shared = { linkType: "Relates", labelPrefix: "intqa-sync-" };

    expect(createDuplicationPolicy(tracker, "SSCVE", { ...shared, duplicatePolicy: "link" }).kind).toBe("link");
    expect(createDuplicationPolicy(tracker, "SSCVE", { ...shared, duplicatePolicy: "label" }).kind).toBe("label");
  });
});
