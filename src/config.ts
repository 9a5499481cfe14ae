import * as z from "zod/v4";
import { ConfigurationError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

export type DuplicatePolicyKind = "link" | "label";

export interface JiraConfig {
  baseUrl: string;
  authHeader: string;
  requestTimeoutMs: number;
  projectKey: string;
}

export interface GitLabConfig {
  baseUrl: string;
  token: string;
  projectId: string;
  defaultBranch: string;
  requestTimeoutMs: number;
}

export interface BranchNamingConfig {
  maxSlugLength: number;
  maxBranchLength: number;
  prefixOverrides: Record<string, string>;
}

export interface SyncConfig {
  sourceProject: string;
  sourceJql: string;
  duplicatePolicy: DuplicatePolicyKind;
  linkType: string;
  labelPrefix: string;
  targetIssueType: string;
  assigneeId?: string;
  parentKey?: string;
  fixVersion?: string;
  readyStatus: string;
}

export interface WatchConfig {
  intervalSeconds: number;
}

export interface LoggingConfig {
  level: LogLevel;
  logDir?: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

const prefixOverridesSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

export function loadJiraConfig(env: NodeJS.ProcessEnv = process.env): JiraConfig {
  const baseUrl = normalizeBaseUrl(readRequired(env.JIRA_BASE_URL, "JIRA_BASE_URL"), "JIRA_BASE_URL");

  let authHeader = env.JIRA_AUTH_HEADER?.trim();
  if (!authHeader) {
    const email = readRequired(env.JIRA_EMAIL, "JIRA_EMAIL");
    const token = readRequired(env.JIRA_API_TOKEN, "JIRA_API_TOKEN");
    authHeader = `Basic ${Buffer.from(`${email}:${token}`).toString("base64")}`;
  }

  return {
    baseUrl,
    authHeader,
    requestTimeoutMs: readPositiveInt(env.JIRA_REQUEST_TIMEOUT_MS, "JIRA_REQUEST_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    projectKey: readRequired(env.JIRA_PROJECT_KEY, "JIRA_PROJECT_KEY")
  };
}

export function loadGitLabConfig(env: NodeJS.ProcessEnv = process.env): GitLabConfig {
  return {
    baseUrl: normalizeBaseUrl(readRequired(env.GITLAB_URL, "GITLAB_URL"), "GITLAB_URL"),
    token: readRequired(env.GITLAB_TOKEN, "GITLAB_TOKEN"),
    projectId: readRequired(env.GITLAB_PROJECT_ID, "GITLAB_PROJECT_ID"),
    defaultBranch: normalizeOptional(env.GITLAB_DEFAULT_BRANCH) ?? "develop",
    requestTimeoutMs: readPositiveInt(env.GITLAB_REQUEST_TIMEOUT_MS, "GITLAB_REQUEST_TIMEOUT_MS", DEFAULT_TIMEOUT_MS)
  };
}

export function loadBranchNamingConfig(env: NodeJS.ProcessEnv = process.env): BranchNamingConfig {
  return {
    maxSlugLength: readPositiveInt(env.BRANCH_MAX_SLUG_LENGTH, "BRANCH_MAX_SLUG_LENGTH", 50),
    maxBranchLength: readPositiveInt(env.BRANCH_MAX_LENGTH, "BRANCH_MAX_LENGTH", 63),
    prefixOverrides: parsePrefixOverrides(env.BRANCH_PREFIX_OVERRIDES)
  };
}

export function loadSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const sourceProject = readRequired(env.SYNC_SOURCE_PROJECT, "SYNC_SOURCE_PROJECT");
  const assigneeId = normalizeOptional(env.SYNC_ASSIGNEE_ID);
  const parentKey = normalizeOptional(env.SYNC_PARENT_KEY);
  const fixVersion = normalizeOptional(env.SYNC_FIX_VERSION);

  return {
    sourceProject,
    sourceJql:
      normalizeOptional(env.SYNC_SOURCE_JQL) ??
      `project=${sourceProject} AND assignee=currentUser() AND statusCategory=indeterminate ORDER BY updated DESC`,
    duplicatePolicy: parseDuplicatePolicy(env.SYNC_DUPLICATE_POLICY),
    linkType: normalizeOptional(env.SYNC_LINK_TYPE) ?? "Relates",
    labelPrefix: normalizeOptional(env.SYNC_LABEL_PREFIX) ?? `${sourceProject.toLowerCase()}-sync-`,
    targetIssueType: normalizeOptional(env.SYNC_TARGET_ISSUE_TYPE) ?? "Task",
    readyStatus: normalizeOptional(env.SYNC_READY_STATUS) ?? "To Do",
    ...(assigneeId ? { assigneeId } : {}),
    ...(parentKey ? { parentKey } : {}),
    ...(fixVersion ? { fixVersion } : {})
  };
}

export function loadWatchConfig(env: NodeJS.ProcessEnv = process.env): WatchConfig {
  return {
    intervalSeconds: readPositiveInt(env.WATCH_INTERVAL_SECONDS, "WATCH_INTERVAL_SECONDS", 30)
  };
}

export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const rawLevel = normalizeOptional(env.LOG_LEVEL);
  const level = parseLogLevel(rawLevel);
  if (rawLevel && !level) {
    throw new ConfigurationError("LOG_LEVEL must be one of: DEBUG, INFO, SKIP, OK, WARN, ERROR.");
  }

  const logDir = normalizeOptional(env.LOG_DIR);

  return {
    level: level ?? "INFO",
    ...(logDir ? { logDir } : {})
  };
}

/**
 * Accepts either `bug=fix,story=feat` or a JSON object. Keys are matched
 * case-insensitively against issue types, so they are stored lowercase.
 */
export function parsePrefixOverrides(input: string | undefined): Record<string, string> {
  const raw = input?.trim();
  if (!raw) {
    return {};
  }

  let candidate: unknown;
  if (raw.startsWith("{")) {
    try {
      candidate = JSON.parse(raw);
    } catch {
      throw new ConfigurationError("BRANCH_PREFIX_OVERRIDES is not valid JSON.");
    }
  } else {
    candidate = Object.fromEntries(
      raw
        .split(",")
        .map((pair) => pair.trim())
        .filter((pair) => pair.length > 0)
        .map((pair) => {
          const separator = pair.indexOf("=");
          if (separator <= 0) {
            throw new ConfigurationError(
              `BRANCH_PREFIX_OVERRIDES entry '${pair}' must look like type=prefix.`
            );
          }

          return [pair.slice(0, separator), pair.slice(separator + 1)];
        })
    );
  }

  const parsed = prefixOverridesSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError("BRANCH_PREFIX_OVERRIDES must map issue types to non-empty prefixes.");
  }

  return Object.fromEntries(
    Object.entries(parsed.data).map(([issueType, prefix]) => [issueType.toLowerCase(), prefix])
  );
}

function parseDuplicatePolicy(input: string | undefined): DuplicatePolicyKind {
  const normalized = input?.trim().toLowerCase();
  if (!normalized) {
    return "link";
  }

  if (normalized === "link" || normalized === "label") {
    return normalized;
  }

  throw new ConfigurationError("SYNC_DUPLICATE_POLICY must be one of: link, label.");
}

function readPositiveInt(raw: string | undefined, name: string, fallback: number): number {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return fallback;
  }

  const value = Number(trimmed);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer.`);
  }

  return value;
}

function normalizeBaseUrl(raw: string, name: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new ConfigurationError(`${name} must be a valid URL, e.g. https://your-domain.example.com`);
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ConfigurationError(`${name} must use http or https.`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

function normalizeOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readRequired(value: string | undefined, name: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }

  return trimmed;
}
