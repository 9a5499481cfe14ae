import type { BranchNamingConfig } from "./config.js";
import type { Issue } from "./types.js";

export const DEFAULT_PREFIX = "feature";

export const DEFAULT_PREFIXES: Readonly<Record<string, string>> = {
  bug: "bugfix",
  story: "feature",
  task: "task",
  epic: "epic",
  subtask: "feature",
  "sub-task": "feature"
};

export const DEFAULT_BRANCH_NAMING: BranchNamingConfig = {
  maxSlugLength: 50,
  maxBranchLength: 63,
  prefixOverrides: {}
};

/**
 * Lowercase, hyphen-separated ASCII slug.
 * Example: "Add OAuth2 로그인" → "add-oauth2"
 */
export function slugify(text: string, maxLength: number): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return clampSlug(slug, maxLength);
}

export function resolvePrefix(
  issueType: string,
  overrides: Readonly<Record<string, string>> = {}
): string {
  const normalized = issueType.trim().toLowerCase();
  return overrides[normalized] ?? DEFAULT_PREFIXES[normalized] ?? DEFAULT_PREFIX;
}

/**
 * `{prefix}/{key}-{slug}`, or `{prefix}/{key}` when the summary has no ASCII
 * letters or digits. The slug is capped at `maxSlugLength` and then cut
 * again so the whole name fits `maxBranchLength`.
 */
export function generateBranchName(
  issue: Pick<Issue, "key" | "summary" | "issueType">,
  config: BranchNamingConfig = DEFAULT_BRANCH_NAMING
): string {
  const prefix = resolvePrefix(issue.issueType, config.prefixOverrides);
  const base = `${prefix}/${issue.key}`;

  let slug = slugify(issue.summary, config.maxSlugLength);
  if (!slug) {
    return base;
  }

  if (base.length + 1 + slug.length > config.maxBranchLength) {
    slug = clampSlug(slug, config.maxBranchLength - base.length - 1);
  }

  return slug ? `${base}-${slug}` : base;
}

function clampSlug(slug: string, maxLength: number): string {
  if (maxLength <= 0) {
    return "";
  }

  if (slug.length <= maxLength) {
    return slug;
  }

  return slug.slice(0, maxLength).replace(/-+$/, "");
}
