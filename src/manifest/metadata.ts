/**
 * Run metadata: when and where a generation run happened, so a set of CSV
 * files can be traced back to the run and the catalog revision behind it.
 */

import { execFileSync } from "node:child_process";
import { hostname } from "node:os";
import { GitStateSchema, type GitState, type RunMetadata } from "./schema.js";

function git(cwd: string, ...args: string[]): string {
  return execFileSync("git", args, {
    cwd,
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "ignore"],
  }).trim();
}

/**
 * Git state of the working copy at `cwd`, or undefined outside a repository,
 * before the first commit, or without a git executable.
 */
export function captureGitState(cwd: string = process.cwd()): GitState | undefined {
  let commitSha: string;
  try {
    commitSha = git(cwd, "rev-parse", "HEAD");
  } catch {
    return undefined;
  }

  try {
    const parsed = GitStateSchema.safeParse({
      commitSha,
      commitShort: commitSha.slice(0, 7),
      branch: git(cwd, "rev-parse", "--abbrev-ref", "HEAD"),
      isDirty: git(cwd, "status", "--porcelain").length > 0,
      commitDate: git(cwd, "log", "-1", "--format=%cI"),
    });
    return parsed.success ? parsed.data : undefined;
  } catch {
    // HEAD resolved but a follow-up query failed (e.g. repository locked)
    return undefined;
  }
}

export interface RunMetadataOptions {
  runId: string;

  /** Default: now */
  startedAt?: Date;

  /** Default: true */
  captureGit?: boolean;

  /** Default: true */
  captureHostname?: boolean;

  /** Working copy inspected for git state (default: process.cwd()) */
  cwd?: string;

  /** Recorded only when it has at least one key */
  context?: Record<string, unknown>;
}

export function createRunMetadata(options: RunMetadataOptions): RunMetadata {
  const gitState = options.captureGit === false ? undefined : captureGitState(options.cwd);
  const context =
    options.context && Object.keys(options.context).length > 0 ? options.context : undefined;

  return {
    runId: options.runId,
    startedAt: (options.startedAt ?? new Date()).toISOString(),
    ...(options.captureHostname === false ? {} : { hostname: hostname() }),
    ...(gitState ? { git: gitState } : {}),
    ...(context ? { context } : {}),
  };
}
