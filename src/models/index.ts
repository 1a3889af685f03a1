export interface WorktreeRecord {
  path: string;
  head: string;
  /** Full ref, e.g. `refs/heads/main`; null when detached or bare. */
  branch: string | null;
  bare: boolean;
  detached: boolean;
  locked: boolean;
  prunable: boolean;
}

export type BranchSource =
  | { kind: "local"; branch: string }
  | { kind: "remote"; branch: string; remoteRef: string }
  | { kind: "new"; branch: string; startPoint: string };

/**
 * The git primitives the worktree commands are built on.
 * Implemented by WorktreeManager; tests substitute an in-memory fake.
 */
export interface WorktreeBackend {
  refExists(ref: string): Promise<boolean>;
  getDefaultBranch(): Promise<string>;
  addWorktree(worktreePath: string, source: BranchSource): Promise<void>;
  removeWorktree(worktreePath: string, force?: boolean): Promise<void>;
  listWorktrees(): Promise<WorktreeRecord[]>;
  pruneWorktrees(): Promise<string>;
  shortStatus(worktreePath: string): Promise<string>;
}

export interface RepositoryContext {
  root: string;
  repoName: string;
  git: WorktreeBackend;
}

export interface CreateOptions {
  baseDir?: string;
  prefix?: string;
  force: boolean;
  copyConfigs: boolean;
  configFiles?: string;
}

export interface CopyReport {
  copied: string[];
  skipped: string[];
  failed: Array<{ file: string; error: string }>;
}

export interface CleanupOptions {
  force: boolean;
  baseDir?: string;
}
