import { getEventListeners } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { LinkDuplicationPolicy } from "./duplicate-detector.js";
import { SyncWorkflow } from "./sync.js";
import { FakeTracker, makeIssue, memoryLogger } from "./test-support.js";
import { interruptibleSleep, IssueWatcher, type Sleep } from "./watcher.js";

const mirrored = makeIssue({ key: "INTQA-1", summary: "Already mirrored" });
const pending = makeIssue({ key: "INTQA-2", summary: "Needs mirror" });
const arrival = makeIssue({ key: "INTQA-3", summary: "New arrival" });

function setup(sleep?: Sleep) {
  const tracker = new FakeTracker();
  tracker.links.push({ linkType: "Relates", inwardKey: "INTQA-1", outwardKey: "SSCVE-9" });
  const policy = new LinkDuplicationPolicy(tracker, { targetProject: "SSCVE", linkType: "Relates" });
  const workflow = new SyncWorkflow(tracker, policy, { projectKey: "SSCVE", issueType: "Task" }, "project=INTQA");
  const logger = memoryLogger();
  const watcher = new IssueWatcher(workflow, logger, { intervalMs: 5_000, ...(sleep ? { sleep } : {}) });
  return { tracker, logger, watcher };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("IssueWatcher.initialize", () => {
  it("records the baseline and syncs the unsynced candidates once", async () => {
    const { tracker, logger, watcher } = setup();
    tracker.searchResults = [mirrored, pending];

    await watcher.initialize();

    expect([...watcher.knownKeys]).toEqual(["INTQA-1", "INTQA-2"]);
    expect(tracker.writes).toEqual(["createIssue:Needs mirror", "link:INTQA-2->SSCVE-1"]);
    expect(logger.lines).toEqual([
      "INFO Initial scan: 2 candidate issue(s)",
      "SKIP [INTQA-1] already synchronized: SSCVE-9",
      "DEBUG Summary: Already mirrored",
      "OK [INTQA-2] -> [SSCVE-1] created / linked",
      "DEBUG Summary: Needs mirror",
      "INFO Initial sync: created 1 / skipped 1 / failed 0"
    ]);
  });

  it("starts from an empty baseline when the first poll fails", async () => {
    const { tracker, logger, watcher } = setup();
    tracker.failSearch = true;

    await watcher.initialize();

    expect(watcher.knownKeys.size).toBe(0);
    expect(logger.lines).toEqual([
      "ERROR Initial scan failed: Jira API request timed out after 30000ms: POST /rest/api/3/search/jql"
    ]);

    tracker.failSearch = false;
    tracker.searchResults = [pending];
    await expect(watcher.tick()).resolves.toEqual({ arrived: ["INTQA-2"], departed: [], polled: 1 });
  });
});

describe("IssueWatcher.tick", () => {
  it("syncs arrivals and reports departures", async () => {
    const { tracker, logger, watcher } = setup();
    tracker.searchResults = [mirrored, pending];
    await watcher.initialize();
    logger.lines.length = 0;

    tracker.searchResults = [pending, arrival];
    const result = await watcher.tick();

    expect(result).toEqual({ arrived: ["INTQA-3"], departed: ["INTQA-1"], polled: 2 });
    expect([...watcher.knownKeys]).toEqual(["INTQA-2", "INTQA-3"]);
    expect(tracker.writes.slice(2)).toEqual(["createIssue:New arrival", "link:INTQA-3->SSCVE-2"]);
    expect(logger.lines).toEqual([
      "INFO 1 new candidate issue(s) detected",
      "OK [INTQA-3] -> [SSCVE-2] created / linked",
      "DEBUG Summary: New arrival",
      "INFO [INTQA-1] no longer a candidate"
    ]);
  });

  it("logs a quiet poll at debug level", async () => {
    const { tracker, logger, watcher } = setup();
    tracker.searchResults = [mirrored];
    await watcher.initialize();
    logger.lines.length = 0;

    await expect(watcher.tick()).resolves.toEqual({ arrived: [], departed: [], polled: 1 });
    expect(logger.lines).toEqual(["DEBUG Polling... (1 candidate issue(s))"]);
  });

  it("lets a returning issue through the duplicate check again", async () => {
    const { tracker, logger, watcher } = setup();
    tracker.searchResults = [mirrored];
    await watcher.initialize();

    tracker.searchResults = [];
    await watcher.tick();
    tracker.searchResults = [mirrored];
    logger.lines.length = 0;

    await expect(watcher.tick()).resolves.toMatchObject({ arrived: ["INTQA-1"] });
    expect(logger.lines).toContain("SKIP [INTQA-1] already synchronized: SSCVE-9");
    expect(tracker.writes).toEqual([]);
  });

  it("keeps the known set when a poll fails", async () => {
    const { tracker, logger, watcher } = setup();
    tracker.searchResults = [mirrored];
    await watcher.initialize();

    tracker.failSearch = true;
    await expect(watcher.tick()).resolves.toBeNull();

    expect([...watcher.knownKeys]).toEqual(["INTQA-1"]);
    expect(logger.lines.at(-1)).toBe(
      "ERROR Poll failed: Jira API request timed out after 30000ms: POST /rest/api/3/search/jql"
    );
  });

  it("continues with the next arrival after a failed one", async () => {
    const { tracker, watcher } = setup();
    await watcher.initialize();
    tracker.failCreate = true;
    tracker.searchResults = [pending, arrival];

    await watcher.tick();
    tracker.failCreate = false;

    expect(tracker.writes).toEqual(["createIssue:Needs mirror", "createIssue:New arrival"]);
  });
});

describe("IssueWatcher.run", () => {
  it("polls between sleeps until the signal aborts", async () => {
    const controller = new AbortController();
    const intervals: number[] = [];
    const sleep: Sleep = async (ms) => {
      intervals.push(ms);
      if (intervals.length === 2) {
        controller.abort();
      }
    };
    const { tracker, logger, watcher } = setup(sleep);

    await watcher.run(controller.signal);

    // one initial scan and one tick
    expect(tracker.searchQueries).toEqual(["project=INTQA", "project=INTQA"]);
    expect(intervals).toEqual([5_000, 5_000]);
    expect(logger.lines).toContain("INFO Watching every 5s");
    expect(logger.lines.at(-1)).toBe("INFO Watcher stopped");
  });
});

describe("interruptibleSleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const sleeping = interruptibleSleep(1_000, new AbortController().signal).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toBe(true);
  });

  it("detaches from the signal after each completed sleep", async () => {
    const controller = new AbortController();

    for (let round = 0; round < 3; round += 1) {
      await interruptibleSleep(1, controller.signal);
    }

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("resolves early on abort", async () => {
    const controller = new AbortController();
    const sleeping = interruptibleSleep(60_000, controller.signal);

    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });

  it("resolves at once when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(interruptibleSleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
