import { describe, expect, it } from "vitest";
import {
  DEFAULT_BRANCH_NAMING,
  generateBranchName,
  resolvePrefix,
  slugify
} from "./branch-naming.js";

// ─── slugify ────────────────────────────────────────────────────────────────

describe("slugify", () => {
  it("lowercases and joins words with single hyphens", () => {
    expect(slugify("Hello,   World!", 50)).toBe("hello-world");
  });

  it("trims leading/trailing hyphens", () => {
    expect(slugify("---hello---", 50)).toBe("hello");
  });

  it("returns an empty string when nothing ASCII-alphanumeric remains", () => {
    expect(slugify("로그인 기능 구현", 50)).toBe("");
  });

  it("keeps the ASCII words of mixed-script text", () => {
    expect(slugify("Add OAuth2 로그인", 50)).toBe("add-oauth2");
  });

  it("strips the hyphen exposed by truncation", () => {
    expect(slugify("abc def", 4)).toBe("abc");
  });

  it("returns short input unchanged after normalization", () => {
    expect(slugify("fix-bug", 50)).toBe("fix-bug");
  });

  it("returns an empty string for a non-positive maximum", () => {
    expect(slugify("anything", 0)).toBe("");
  });

  it("always yields a well-formed slug within the maximum", () => {
    const inputs = ["A very long summary text", "  ~~ x ~~ ", "ÄÖÜ äöü", "123 -- 456", "a-b-c-d-e-f-g", ""];

    for (const input of inputs) {
      for (const max of [1, 2, 3, 5, 8, 13]) {
        const slug = slugify(input, max);
        expect(slug.length).toBeLessThanOrEqual(max);
        expect(slug === "" || /^[a-z0-9]+(-[a-z0-9]+)*$/.test(slug)).toBe(true);
      }
    }
  });
});

// ─── resolvePrefix ──────────────────────────────────────────────────────────

describe("resolvePrefix", () => {
  it("maps the default table case-insensitively", () => {
    expect(resolvePrefix("BUG")).toBe("bugfix");
    expect(resolvePrefix("Story")).toBe("feature");
    expect(resolvePrefix("task")).toBe("task");
    expect(resolvePrefix("Epic")).toBe("epic");
    expect(resolvePrefix("Subtask")).toBe("feature");
    expect(resolvePrefix(" Sub-Task ")).toBe("feature");
  });

  it("falls back to feature for unknown types", () => {
    expect(resolvePrefix("Improvement")).toBe("feature");
    expect(resolvePrefix("")).toBe("feature");
  });

  it("lets overrides replace single entries and add new ones", () => {
    const overrides = { bug: "fix", improvement: "chore" };

    expect(resolvePrefix("Bug", overrides)).toBe("fix");
    expect(resolvePrefix("Improvement", overrides)).toBe("chore");
    expect(resolvePrefix("Story", overrides)).toBe("feature");
  });
});

// ─── generateBranchName ─────────────────────────────────────────────────────

describe("generateBranchName", () => {
  it("builds prefix/key-slug", () => {
    const issue = { key: "SSCVE-101", issueType: "Bug", summary: "Fix login error" };
    expect(generateBranchName(issue)).toBe("bugfix/SSCVE-101-fix-login-error");
  });

  it("omits the slug when the summary has no ASCII content", () => {
    const issue = { key: "SSCVE-701", issueType: "Story", summary: "로그인 기능 구현" };
    expect(generateBranchName(issue)).toBe("feature/SSCVE-701");
  });

  it("keeps only the ASCII part of a mixed summary", () => {
    const issue = { key: "SSCVE-702", issueType: "Story", summary: "Add OAuth2 로그인" };
    expect(generateBranchName(issue)).toBe("feature/SSCVE-702-add-oauth2");
  });

  it("caps the slug and then the whole name", () => {
    const issue = { key: "SSCVE-901", issueType: "Task", summary: "a".repeat(100) };
    const name = generateBranchName(issue);

    // "task/SSCVE-901-" is 15 characters, leaving 48 of the default 63
    expect(name).toBe(`task/SSCVE-901-${"a".repeat(48)}`);
    expect(name.slice("task/SSCVE-901-".length).length).toBeLessThanOrEqual(50);
  });

  it("honours a custom slug length", () => {
    const issue = { key: "SSCVE-902", issueType: "Task", summary: "A very long summary text" };
    const config = { ...DEFAULT_BRANCH_NAMING, maxSlugLength: 10 };

    expect(generateBranchName(issue, config)).toBe("task/SSCVE-902-a-very-lon");
  });

  it("re-truncates the slug when a long key pushes the name over budget", () => {
    const issue = {
      key: "VERYLONGPROJECT-123456",
      issueType: "Bug",
      summary: "Refactor the payment gateway integration layer"
    };
    const config = { ...DEFAULT_BRANCH_NAMING, maxBranchLength: 39 };

    // 39 - len("bugfix/VERYLONGPROJECT-123456") - 1 = 9 → "refactor-" → "refactor"
    expect(generateBranchName(issue, config)).toBe("bugfix/VERYLONGPROJECT-123456-refactor");
  });

  it("falls back to prefix/key when the key alone exhausts the budget", () => {
    const issue = { key: "VERYLONGPROJECT-123456", issueType: "Bug", summary: "Anything" };
    const config = { ...DEFAULT_BRANCH_NAMING, maxBranchLength: 20 };

    expect(generateBranchName(issue, config)).toBe("bugfix/VERYLONGPROJECT-123456");
  });

  it("applies prefix overrides from config", () => {
    const issue = { key: "SSCVE-5", issueType: "Bug", summary: "Crash" };
    const config = { ...DEFAULT_BRANCH_NAMING, prefixOverrides: { bug: "hotfix" } };

    expect(generateBranchName(issue, config)).toBe("hotfix/SSCVE-5-crash");
  });

  it("is stable and starts with prefix/key", () => {
    const issue = { key: "SSCVE-77", issueType: "Epic", summary: "Payments v2: rollout & cleanup" };

    const first = generateBranchName(issue);
    expect(generateBranchName(issue)).toBe(first);
    expect(first.startsWith("epic/SSCVE-77")).toBe(true);
    expect(first).toBe("epic/SSCVE-77-payments-v2-rollout-cleanup");
  });
});
