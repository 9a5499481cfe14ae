import { formatError } from "./errors.js";
import type { Logger } from "./logger.js";
import { reportSyncOutcome, reportSyncSummary } from "./reporter.js";
import type { SyncWorkflow } from "./sync.js";
import type { Issue } from "./types.js";

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface TickResult {
  arrived: string[];
  departed: string[];
  polled: number;
}

export interface IssueWatcherOptions {
  intervalMs: number;
  sleep?: Sleep;
}

/** Sleep that resolves immediately when the abort signal fires. */
export function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Polls the candidate query and feeds newly arrived issues to the sync
 * workflow. `known` lives in memory only; after a restart the first poll is
 * the new baseline and its unsynced issues are synced once.
 */
export class IssueWatcher {
  private known = new Set<string>();
  private readonly sleep: Sleep;

  constructor(
    private readonly workflow: SyncWorkflow,
    private readonly logger: Logger,
    private readonly options: IssueWatcherOptions
  ) {
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  get knownKeys(): ReadonlySet<string> {
    return this.known;
  }

  /**
   * A failed first poll leaves `known` empty, so the next successful tick
   * treats every candidate as an arrival; the duplicate check still applies.
   * An abort stops the initial sync between issues.
   */
  async initialize(signal?: AbortSignal): Promise<void> {
    let current: Issue[];
    try {
      current = await this.workflow.fetchCandidates();
    } catch (error) {
      this.logger.error(`Initial scan failed: ${formatError(error)}`);
      return;
    }

    this.known = new Set(current.map((issue) => issue.key));
    this.logger.info(`Initial scan: ${current.length} candidate issue(s)`);

    const report = await this.workflow.syncBatch(current, signal);
    reportSyncSummary(this.logger, "Initial sync", report);
  }

  async tick(): Promise<TickResult | null> {
    let current: Issue[];
    try {
      current = await this.workflow.fetchCandidates();
    } catch (error) {
      this.logger.error(`Poll failed: ${formatError(error)}`);
      return null;
    }

    const currentKeys = new Set(current.map((issue) => issue.key));
    const arrivedIssues = current.filter((issue) => !this.known.has(issue.key));
    const departed = [...this.known].filter((key) => !currentKeys.has(key));
    this.known = currentKeys;

    if (arrivedIssues.length > 0) {
      this.logger.info(`${arrivedIssues.length} new candidate issue(s) detected`);
      for (const issue of arrivedIssues) {
        reportSyncOutcome(this.logger, await this.workflow.syncIssue(issue));
      }
    } else {
      this.logger.debug(`Polling... (${currentKeys.size} candidate issue(s))`);
    }

    for (const key of departed) {
      this.logger.info(`[${key}] no longer a candidate`);
    }

    return {
      arrived: arrivedIssues.map((issue) => issue.key),
      departed,
      polled: current.length
    };
  }

  /** Runs until `signal` aborts. The signal is honoured between ticks, never inside one. */
  async run(signal: AbortSignal): Promise<void> {
    await this.initialize(signal);
    this.logger.info(`Watching every ${Math.round(this.options.intervalMs / 1000)}s`);

    while (!signal.aborted) {
      await this.sleep(this.options.intervalMs, signal);
      if (signal.aborted) {
        break;
      }

      await this.tick();
    }

    this.logger.info("Watcher stopped");
  }
}
