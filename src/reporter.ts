import type { BranchOutcome, BranchReport } from "./branches.js";
import type { Logger } from "./logger.js";
import type { SyncOutcome, SyncReport } from "./sync.js";

export function reportSyncOutcome(logger: Logger, outcome: SyncOutcome): void {
  switch (outcome.kind) {
    case "skipped":
      logger.skip(`[${outcome.sourceKey}] already synchronized: ${outcome.targetKey}`);
      break;
    case "created":
      if (outcome.linked) {
        logger.ok(`[${outcome.sourceKey}] -> [${outcome.targetKey}] created / linked`);
      } else {
        logger.ok(`[${outcome.sourceKey}] -> [${outcome.targetKey}] created`);
        logger.warn(
          `[${outcome.sourceKey}] could not record the link to ${outcome.targetKey}; link it manually` +
            (outcome.linkError ? ` (${outcome.linkError})` : "")
        );
      }
      for (const note of outcome.notes) {
        logger.warn(`[${outcome.sourceKey}] ${note}`);
      }
      break;
    case "failed":
      logger.error(
        `[${outcome.sourceKey}] ${outcome.stage === "check" ? "duplicate check" : "target issue creation"} failed: ${outcome.error}`
      );
      break;
  }

  logger.debug(`Summary: ${outcome.summary}`);
}

export function reportSyncSummary(logger: Logger, label: string, report: SyncReport): void {
  for (const outcome of report.outcomes) {
    reportSyncOutcome(logger, outcome);
  }

  logger.info(
    `${label}: created ${report.created} / skipped ${report.skipped} / failed ${report.failed}`
  );
}

export function reportBranchOutcome(logger: Logger, outcome: BranchOutcome): void {
  switch (outcome.kind) {
    case "created":
      logger.ok(`[${outcome.issueKey}] branch created: ${outcome.branchName}`);
      break;
    case "skipped":
      logger.skip(`[${outcome.issueKey}] branch already exists: ${outcome.branchName}`);
      break;
    case "planned":
      logger.info(`[${outcome.issueKey}] [DRY-RUN] would create ${outcome.branchName}`);
      break;
    case "failed":
      logger.error(`[${outcome.issueKey}] branch ${outcome.branchName} failed: ${outcome.error}`);
      break;
  }
}

export function reportBranchSummary(logger: Logger, label: string, report: BranchReport): void {
  for (const outcome of report.outcomes) {
    reportBranchOutcome(logger, outcome);
  }

  logger.info(
    `${label}: created ${report.created} / planned ${report.planned} / skipped ${report.skipped} / failed ${report.failed}`
  );
}
