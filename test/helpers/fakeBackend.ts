import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import type {
  BranchSource,
  RepositoryContext,
  WorktreeBackend,
  WorktreeRecord,
} from "../../src/models";

export function worktreeRecord(
  worktreePath: string,
  branch: string | null,
  overrides: Partial<WorktreeRecord> = {},
): WorktreeRecord {
  return {
    path: worktreePath,
    head: "1234567890abcdef1234567890abcdef12345678",
    branch: branch === null ? null : `refs/heads/${branch}`,
    bare: false,
    detached: branch === null,
    locked: false,
    prunable: false,
    ...overrides,
  };
}

/**
 * In-memory stand-in for WorktreeManager. Branches and worktrees live in
 * plain collections; `addWorktree` also creates the directory on disk so
 * config copying has somewhere to write.
 */
export class FakeBackend implements WorktreeBackend {
  localBranches = new Set<string>();
  remoteBranches = new Set<string>();
  defaultBranch = "main";
  worktrees: WorktreeRecord[] = [];
  statuses = new Map<string, string | Error>();
  pruneOutput = "";

  calls: string[] = [];
  createdBranches: string[] = [];
  added: Array<{ path: string; source: BranchSource }> = [];
  removed: Array<{ path: string; force: boolean }> = [];

  async refExists(ref: string): Promise<boolean> {
    this.calls.push(`refExists ${ref}`);
    if (ref.startsWith("refs/heads/")) {
      return this.localBranches.has(ref.substring("refs/heads/".length));
    }
    if (ref.startsWith("refs/remotes/origin/")) {
      return this.remoteBranches.has(ref.substring("refs/remotes/origin/".length));
    }
    return false;
  }

  async getDefaultBranch(): Promise<string> {
    this.calls.push("getDefaultBranch");
    return this.defaultBranch;
  }

  async addWorktree(worktreePath: string, source: BranchSource): Promise<void> {
    this.calls.push(`addWorktree ${worktreePath}`);
    if (source.kind !== "local") {
      this.createdBranches.push(source.branch);
      this.localBranches.add(source.branch);
    }
    fs.mkdirSync(worktreePath, { recursive: true });
    this.added.push({ path: worktreePath, source });
    this.worktrees.push(worktreeRecord(worktreePath, source.branch));
  }

  async removeWorktree(worktreePath: string, force: boolean = false): Promise<void> {
    this.calls.push(`removeWorktree ${worktreePath}`);
    this.removed.push({ path: worktreePath, force });
    this.worktrees = this.worktrees.filter(
      (wt) => path.resolve(wt.path) !== path.resolve(worktreePath),
    );
  }

  async listWorktrees(): Promise<WorktreeRecord[]> {
    this.calls.push("listWorktrees");
    return [...this.worktrees];
  }

  async pruneWorktrees(): Promise<string> {
    this.calls.push("pruneWorktrees");
    return this.pruneOutput;
  }

  async shortStatus(worktreePath: string): Promise<string> {
    this.calls.push(`shortStatus ${worktreePath}`);
    const status = this.statuses.get(worktreePath);
    if (status instanceof Error) {
      throw status;
    }
    return status ?? "";
  }
}

export function createContext(root: string, git: FakeBackend): RepositoryContext {
  return { root, repoName: path.basename(root), git };
}

export function createTempDir(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

/**
 * Silence console output for a test and collect what would have been printed.
 */
export function captureConsole() {
  const logs: string[] = [];
  const errors: string[] = [];
  const collect = (target: string[]) => (...args: unknown[]) => {
    target.push(args.map(String).join(" "));
  };

  const spies = [
    vi.spyOn(console, "log").mockImplementation(collect(logs)),
    vi.spyOn(console, "warn").mockImplementation(collect(logs)),
    vi.spyOn(console, "error").mockImplementation(collect(errors)),
  ];

  return {
    logs,
    errors,
    restore: () => {
      for (const spy of spies) {
        spy.mockRestore();
      }
    },
  };
}
