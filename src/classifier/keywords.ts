import type { IntentType } from "../types.js";

export type KeywordTable = ReadonlyArray<readonly [IntentType, readonly string[]]>;

/**
 * Phrases matched at a word start, case-insensitively. Order breaks ties:
 * more specific intents come first, plain generation last.
 */
export const DEFAULT_KEYWORDS: KeywordTable = [
  ["project_setup", ["new project", "scaffold", "bootstrap", "project setup", "set up a project", "starter template"]],
  ["security_scan", ["security", "vulnerab", "cve", "audit", "secret scan"]],
  ["infrastructure_setup", ["dockerfile", "docker", "kubernetes", "terraform", "infrastructure", "provision"]],
  ["deployment", ["deploy", "release", "ci/cd", "pipeline", "rollout"]],
  ["testing", ["unit test", "integration test", "write tests", "test coverage", "tests"]],
  ["debugging", ["debug", "fix", "bug", "crash", "stack trace", "not working"]],
  ["refactoring", ["refactor", "clean up", "restructure", "simplify", "rename"]],
  ["code_review", ["code review", "review", "feedback on", "critique"]],
  ["documentation", ["document", "readme", "docstring", "docs"]],
  ["explanation", ["explain", "what does", "how does", "why does", "walk me through"]],
  ["code_generation", ["create a function", "write code", "implement", "generate", "create", "write a"]],
];
