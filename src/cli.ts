import { parseArgs } from "node:util";
import * as z from "zod/v4";
import { BranchWorkflow } from "./branches.js";
import {
  loadBranchNamingConfig,
  loadGitLabConfig,
  loadJiraConfig,
  loadLoggingConfig,
  loadSyncConfig,
  loadWatchConfig,
  type SyncConfig
} from "./config.js";
import { createDuplicationPolicy } from "./duplicate-detector.js";
import { formatError } from "./errors.js";
import { GitLabClient } from "./gitlab-client.js";
import { JiraClient } from "./jira-client.js";
import { consoleSink, createLogger, dailyFileSink, type Logger, type LogSink } from "./logger.js";
import { reportBranchSummary, reportSyncSummary } from "./reporter.js";
import { SyncWorkflow } from "./sync.js";
import { IssueWatcher, type Sleep } from "./watcher.js";
import { WorkflowService, type WorkflowResult } from "./workflow.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INTERRUPTED = 130;

const USAGE = `Usage: issue-branch-sync [--verbose] <command> [options]

Commands:
  branch <issue-key> [--ref <ref>]           Create a GitLab branch from an existing issue
  create <summary> [--type <type>] [--description <text>] [--label <label>]... [--transition <status>] [--ref <ref>]
                                             Create an issue, then its branch (-l/--label repeats)
  transition <issue-key> <status>            Move an issue to another status
  transitions <issue-key>                    List available transitions
  preview <issue-key>                        Print the branch name an issue would get
  sync [--dry-run]                           Mirror source issues, then branch ready issues
  watch [--interval <seconds>]               Poll for new source issues and sync them`;

const nonEmpty = z.string().trim().min(1);
const issueKeySchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z][A-Za-z0-9_]*-\d+$/, "Issue key must look like PROJ-123")
  .transform((value) => value.toUpperCase());
const intervalSchema = z.coerce.number().int().positive();

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  signal?: AbortSignal;
  logSinks?: LogSink[];
  sleep?: Sleep;
}

interface CommandContext {
  positionals: string[];
  flags: ParsedFlags;
  env: NodeJS.ProcessEnv;
  io: CliIo;
  logger: Logger;
  signal: AbortSignal;
  sleep?: Sleep;
}

interface ParsedFlags {
  ref?: string;
  type?: string;
  description?: string;
  label?: string[];
  transition?: string;
  "dry-run"?: boolean;
  interval?: string;
  verbose?: boolean;
  help?: boolean;
}

type CommandHandler = (context: CommandContext) => Promise<number>;

class UsageError extends Error {}

const COMMANDS: Record<string, CommandHandler> = {
  branch: handleBranch,
  create: handleCreate,
  transition: handleTransition,
  transitions: handleTransitions,
  preview: handlePreview,
  sync: handleSync,
  watch: handleWatch
};

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const io = options.io ?? {
    stdout: (line: string) => console.log(line),
    stderr: (line: string) => console.error(line)
  };
  const signal = options.signal ?? new AbortController().signal;

  let flags: ParsedFlags;
  let positionals: string[];
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        ref: { type: "string" },
        type: { type: "string" },
        description: { type: "string", short: "d" },
        label: { type: "string", short: "l", multiple: true },
        transition: { type: "string", short: "t" },
        "dry-run": { type: "boolean" },
        interval: { type: "string" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" }
      }
    });
    flags = parsed.values;
    positionals = parsed.positionals;
  } catch (error) {
    io.stderr(formatError(error));
    io.stderr(USAGE);
    return EXIT_ERROR;
  }

  const [command, ...rest] = positionals;
  if (flags.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const handler = command ? COMMANDS[command] : undefined;
  if (!handler) {
    io.stderr(command ? `Unknown command: ${command}` : "Missing command.");
    io.stderr(USAGE);
    return EXIT_ERROR;
  }

  const run = async (): Promise<number> => {
    try {
      const logging = loadLoggingConfig(env);
      const sinks = options.logSinks ?? [
        consoleSink(),
        ...(logging.logDir ? [dailyFileSink(logging.logDir, command ?? "cli")] : [])
      ];
      const logger = createLogger({ level: flags.verbose ? "DEBUG" : logging.level, sinks });

      return await handler({
        positionals: rest,
        flags,
        env,
        io,
        logger,
        signal,
        ...(options.sleep ? { sleep: options.sleep } : {})
      });
    } catch (error) {
      io.stderr(`Error: ${formatError(error)}`);
      if (error instanceof UsageError) {
        io.stderr(USAGE);
      }
      return EXIT_ERROR;
    }
  };

  // watch and sync stop between items on their own; other commands are abandoned.
  if (command === "watch" || command === "sync") {
    return run();
  }

  return Promise.race([run(), interruptedBy(signal)]);
}

function interruptedBy(signal: AbortSignal): Promise<number> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(EXIT_INTERRUPTED);
      return;
    }
    signal.addEventListener("abort", () => resolve(EXIT_INTERRUPTED), { once: true });
  });
}

function parseInput<T>(schema: z.ZodType<T>, value: unknown, name: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues[0]?.message ?? "invalid value";
    throw new UsageError(`Invalid ${name}: ${detail}`);
  }

  return result.data;
}

function requirePositional(context: CommandContext, index: number, name: string): string {
  const value = context.positionals[index];
  if (value === undefined) {
    throw new UsageError(`Missing <${name}>.`);
  }

  return value;
}

function buildWorkflowService(context: CommandContext, withBranchHost: boolean): WorkflowService {
  const jiraConfig = loadJiraConfig(context.env);
  const naming = loadBranchNamingConfig(context.env);
  const host = withBranchHost ? new GitLabClient(loadGitLabConfig(context.env)) : undefined;

  return new WorkflowService(new JiraClient(jiraConfig), host, naming, jiraConfig.projectKey);
}

function printResult(io: CliIo, result: WorkflowResult): void {
  const rule = "========================================";
  io.stdout(rule);
  io.stdout(`  ${result.message}`);
  io.stdout(rule);
  io.stdout(`  Issue   : ${result.issue.key}`);
  io.stdout(`  Type    : ${result.issue.issueType}`);
  io.stdout(`  Summary : ${result.issue.summary}`);
  io.stdout(`  Status  : ${result.issue.status}`);
  if (result.branch) {
    io.stdout(`  Branch  : ${result.branch.name}`);
    io.stdout(`  Ref     : ${result.branch.ref}`);
    if (result.branch.webUrl) {
      io.stdout(`  URL     : ${result.branch.webUrl}`);
    }
  }
  io.stdout(rule);
}

async function handleBranch(context: CommandContext): Promise<number> {
  const issueKey = parseInput(issueKeySchema, requirePositional(context, 0, "issue-key"), "issue key");
  const service = buildWorkflowService(context, true);

  printResult(context.io, await service.createBranchFromIssue(issueKey, context.flags.ref));
  return EXIT_OK;
}

async function handleCreate(context: CommandContext): Promise<number> {
  const summary = parseInput(nonEmpty, requirePositional(context, 0, "summary"), "summary");
  const service = buildWorkflowService(context, true);
  const { flags } = context;

  const result = await service.createIssueAndBranch({
    summary,
    issueType: flags.type ? parseInput(nonEmpty, flags.type, "type") : "Task",
    ...(flags.description ? { description: flags.description } : {}),
    ...(flags.label ? { labels: flags.label.map((label) => parseInput(nonEmpty, label, "label")) } : {}),
    ...(flags.transition ? { transition: flags.transition } : {}),
    ...(flags.ref ? { ref: flags.ref } : {})
  });

  printResult(context.io, result);
  return EXIT_OK;
}

async function handleTransition(context: CommandContext): Promise<number> {
  const issueKey = parseInput(issueKeySchema, requirePositional(context, 0, "issue-key"), "issue key");
  const status = parseInput(nonEmpty, requirePositional(context, 1, "status"), "status");
  const service = buildWorkflowService(context, false);

  printResult(context.io, await service.transitionIssue(issueKey, status));
  return EXIT_OK;
}

async function handleTransitions(context: CommandContext): Promise<number> {
  const issueKey = parseInput(issueKeySchema, requirePositional(context, 0, "issue-key"), "issue key");
  const service = buildWorkflowService(context, false);

  const transitions = await service.listTransitions(issueKey);
  context.io.stdout(`Available transitions for ${issueKey}:`);
  if (transitions.length === 0) {
    context.io.stdout("  (none)");
  }
  for (const transition of transitions) {
    context.io.stdout(
      `  -> ${transition.name}${transition.toStatus && transition.toStatus !== transition.name ? ` (${transition.toStatus})` : ""}`
    );
  }
  return EXIT_OK;
}

async function handlePreview(context: CommandContext): Promise<number> {
  const issueKey = parseInput(issueKeySchema, requirePositional(context, 0, "issue-key"), "issue key");
  const service = buildWorkflowService(context, false);

  context.io.stdout(await service.previewBranchName(issueKey));
  return EXIT_OK;
}

async function handleSync(context: CommandContext): Promise<number> {
  const jiraConfig = loadJiraConfig(context.env);
  const syncConfig = loadSyncConfig(context.env);
  const gitlabConfig = loadGitLabConfig(context.env);
  const naming = loadBranchNamingConfig(context.env);
  const dryRun = context.flags["dry-run"] ?? false;
  const { logger } = context;

  const jira = new JiraClient(jiraConfig);
  const workflow = buildSyncWorkflow(jira, jiraConfig.projectKey, syncConfig);

  logger.info(`[Phase 1] ${syncConfig.sourceProject} -> ${jiraConfig.projectKey} issue sync`);
  const candidates = await workflow.fetchCandidates();
  logger.info(`${candidates.length} candidate issue(s)`);
  reportSyncSummary(logger, "Phase 1 done", await workflow.syncBatch(candidates, context.signal));
  if (context.signal.aborted) {
    logger.warn("Interrupted; skipping the branch phase");
    return EXIT_INTERRUPTED;
  }

  logger.info(
    `[Phase 2] ${jiraConfig.projectKey} '${syncConfig.readyStatus}' -> GitLab branches${dryRun ? " [DRY-RUN]" : ""}`
  );
  const branches = new BranchWorkflow(jira, new GitLabClient(gitlabConfig), naming);
  const ready = await branches.fetchReadyIssues(jiraConfig.projectKey, syncConfig.readyStatus);
  logger.info(`${ready.length} ready issue(s)`);
  reportBranchSummary(
    logger,
    "Phase 2 done",
    await branches.ensureBranches(ready, { dryRun, signal: context.signal })
  );

  return context.signal.aborted ? EXIT_INTERRUPTED : EXIT_OK;
}

async function handleWatch(context: CommandContext): Promise<number> {
  const jiraConfig = loadJiraConfig(context.env);
  const syncConfig = loadSyncConfig(context.env);
  const intervalSeconds = context.flags.interval
    ? parseInput(intervalSchema, context.flags.interval, "interval")
    : loadWatchConfig(context.env).intervalSeconds;

  const workflow = buildSyncWorkflow(new JiraClient(jiraConfig), jiraConfig.projectKey, syncConfig);
  const watcher = new IssueWatcher(workflow, context.logger, {
    intervalMs: intervalSeconds * 1000,
    ...(context.sleep ? { sleep: context.sleep } : {})
  });

  context.logger.info(
    `Watching ${syncConfig.sourceProject} -> ${jiraConfig.projectKey} (${syncConfig.duplicatePolicy} policy); Ctrl+C to stop`
  );
  await watcher.run(context.signal);
  return EXIT_OK;
}

function buildSyncWorkflow(
  jira: JiraClient,
  targetProject: string,
  syncConfig: SyncConfig
): SyncWorkflow {
  const policy = createDuplicationPolicy(jira, targetProject, syncConfig);

  return new SyncWorkflow(
    jira,
    policy,
    {
      projectKey: targetProject,
      issueType: syncConfig.targetIssueType,
      ...(syncConfig.assigneeId ? { assigneeId: syncConfig.assigneeId } : {}),
      ...(syncConfig.parentKey ? { parentKey: syncConfig.parentKey } : {}),
      ...(syncConfig.fixVersion ? { fixVersion: syncConfig.fixVersion } : {})
    },
    syncConfig.sourceJql
  );
}
