import { simpleGit, type SimpleGit } from "simple-git";
import * as fs from "fs";
import * as path from "path";
import type {
  BranchSource,
  RepositoryContext,
  WorktreeBackend,
  WorktreeRecord,
} from "../models";
import { findRepositoryRoot } from "../utils";

// Constants
export const DEFAULT_REMOTE = "origin";
export const FALLBACK_MAIN_BRANCH = "main";

/**
 * Parse `git worktree list --porcelain` output. Records are separated by
 * blank lines; attribute lines follow the `worktree <path>` line.
 */
export function* parseWorktreePorcelain(
  output: string,
): Generator<WorktreeRecord, void, unknown> {
  let current: WorktreeRecord | null = null;

  for (const line of output.split("\n")) {
    if (line.startsWith("worktree ")) {
      if (current) {
        yield current;
      }
      current = {
        path: line.substring(9),
        head: "",
        branch: null,
        bare: false,
        detached: false,
        locked: false,
        prunable: false,
      };
      continue;
    }

    if (!current) {
      continue;
    }

    if (line.startsWith("HEAD ")) {
      current.head = line.substring(5);
    } else if (line.startsWith("branch ")) {
      current.branch = line.substring(7);
    } else if (line === "bare") {
      current.bare = true;
    } else if (line === "detached") {
      current.detached = true;
    } else if (line === "locked" || line.startsWith("locked ")) {
      current.locked = true;
    } else if (line === "prunable" || line.startsWith("prunable ")) {
      current.prunable = true;
    }
  }

  if (current) {
    yield current;
  }
}

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

export interface ResolveTargetOptions {
  /** Accept only paths git has registered as worktrees. */
  registeredOnly?: boolean;
}

/**
 * Resolve a path-or-branch argument to a worktree path.
 *
 * The worktree checked out on `refs/heads/<target>` wins; otherwise a
 * registered worktree path. Unless `registeredOnly` is set, an existing
 * directory or a path-like target is returned as-is so git can report on it.
 */
export async function resolveWorktreeTarget(
  git: WorktreeBackend,
  target: string,
  options: ResolveTargetOptions = {},
): Promise<string | undefined> {
  const worktrees = await git.listWorktrees();

  const byBranch = worktrees.find((wt) => wt.branch === `refs/heads/${target}`);
  if (byBranch) {
    return byBranch.path;
  }

  const resolvedTarget = path.resolve(target);
  const byPath = worktrees.find((wt) => path.resolve(wt.path) === resolvedTarget);
  if (byPath) {
    return byPath.path;
  }

  if (options.registeredOnly) {
    return undefined;
  }

  if (
    isDirectory(resolvedTarget) ||
    target.includes("/") ||
    target.includes(path.sep)
  ) {
    return resolvedTarget;
  }

  return undefined;
}

export class WorktreeManager implements WorktreeBackend {
  private git: SimpleGit;
  private repoPath: string;

  constructor(repoPath?: string) {
    this.repoPath = repoPath || process.cwd();
    this.git = simpleGit({ baseDir: this.repoPath });
  }

  /**
   * Locate the enclosing repository, verify git accepts it and return the
   * context every command runs against.
   */
  static async discover(startPath?: string): Promise<RepositoryContext> {
    const root = await findRepositoryRoot(startPath);
    const manager = new WorktreeManager(root);
    await manager.initialize();
    return { root, repoName: path.basename(root), git: manager };
  }

  async initialize(): Promise<void> {
    try {
      await this.git.raw(["rev-parse", "--git-dir"]);
    } catch (error) {
      throw new Error(`Not in a git repository: ${error}`);
    }
  }

  /**
   * Exact match on a full ref name; revision syntax such as `main~1` does
   * not count as an existing ref.
   */
  async refExists(ref: string): Promise<boolean> {
    try {
      const result = await this.git.raw(["show-ref", "--verify", ref]);
      return result.trim().length > 0;
    } catch {
      return false;
    }
  }

  async getDefaultBranch(): Promise<string> {
    try {
      const result = await this.git.raw([
        "symbolic-ref",
        `refs/remotes/${DEFAULT_REMOTE}/HEAD`,
      ]);
      const branch = result.trim().replace(`refs/remotes/${DEFAULT_REMOTE}/`, "");
      return branch || FALLBACK_MAIN_BRANCH;
    } catch {
      return FALLBACK_MAIN_BRANCH;
    }
  }

  async addWorktree(worktreePath: string, source: BranchSource): Promise<void> {
    const args = ["worktree", "add"];

    switch (source.kind) {
      case "local":
        args.push(worktreePath, source.branch);
        break;
      case "remote":
        args.push("--track", "-b", source.branch, worktreePath, source.remoteRef);
        break;
      case "new":
        args.push("-b", source.branch, worktreePath, source.startPoint);
        break;
    }

    try {
      await this.git.raw(args);
    } catch (error) {
      throw new Error(`Failed to add worktree: ${error}`);
    }
  }

  async removeWorktree(worktreePath: string, force: boolean = false): Promise<void> {
    try {
      const args = ["worktree", "remove"];
      if (force) {
        args.push("--force");
      }
      args.push(worktreePath);
      await this.git.raw(args);
    } catch (error) {
      throw new Error(`Failed to remove worktree: ${error}`);
    }
  }

  async listWorktrees(): Promise<WorktreeRecord[]> {
    try {
      const result = await this.git.raw(["worktree", "list", "--porcelain"]);
      return Array.from(parseWorktreePorcelain(result));
    } catch (error) {
      throw new Error(`Failed to list worktrees: ${error}`);
    }
  }

  async pruneWorktrees(): Promise<string> {
    try {
      const result = await this.git.raw(["worktree", "prune", "--verbose"]);
      return result.trim();
    } catch (error) {
      throw new Error(`Failed to prune worktrees: ${error}`);
    }
  }

  async shortStatus(worktreePath: string): Promise<string> {
    // simpleGit throws synchronously when the directory is gone
    const git = simpleGit(worktreePath);
    const result = await git.raw(["status", "--short", "--branch"]);
    return result.trimEnd();
  }
}
