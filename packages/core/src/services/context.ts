import { createHash } from "node:crypto";
import { basename, resolve } from "node:path";
import type { Context } from "@devports/shared";
import { runCommand } from "../utils/exec.js";

const GIT_TIMEOUT_MS = 5000;

async function git(cwd: string, args: string[]): Promise<string | undefined> {
  const result = await runCommand("git", args, { cwd, timeoutMs: GIT_TIMEOUT_MS });
  const output = result.stdout.trim();
  return result.ok && result.exitCode === 0 && output ? output : undefined;
}

async function getGitRemote(path: string): Promise<string | undefined> {
  return git(path, ["remote", "get-url", "origin"]);
}

async function getGitBranch(path: string): Promise<string | undefined> {
  const branch = await git(path, ["branch", "--show-current"]);
  if (branch) {
    return branch;
  }

  // Detached HEAD: name the context after the worktree directory
  const toplevel = await git(path, ["rev-parse", "--show-toplevel"]);
  return toplevel ? basename(toplevel) : undefined;
}

/**
 * Repository name from a remote URL
 *
 * @example
 * extractRepoName("git@github.com:acme/api.git") // "api"
 * extractRepoName("https://github.com/acme/api") // "api"
 */
export function extractRepoName(remoteUrl: string): string {
  const trimmed = remoteUrl.replace(/\/+$/, "");
  const name = trimmed.slice(trimmed.lastIndexOf("/") + 1);
  return name.endsWith(".git") ? name.slice(0, -4) : name;
}

export function hashIdentity(identity: string): string {
  return createHash("md5").update(identity).digest("hex").slice(0, 12);
}

/**
 * Build a context from its git identity, falling back to the absolute path
 */
export function buildContext(path: string, remote?: string, branch?: string): Context {
  if (remote && branch) {
    return {
      hash: hashIdentity(`${remote}:${branch}`),
      path,
      label: `${extractRepoName(remote)}/${branch}`,
      remote,
      branch,
    };
  }

  return {
    hash: hashIdentity(path),
    path,
    label: basename(path) || path,
    remote,
    branch,
  };
}

/**
 * Derive the context of a directory. Git-based contexts stay stable when the
 * checkout moves; each branch gets its own context.
 */
export async function getContext(path: string = process.cwd()): Promise<Context> {
  const absolute = resolve(path);
  const [remote, branch] = await Promise.all([getGitRemote(absolute), getGitBranch(absolute)]);
  return buildContext(absolute, remote, branch);
}
