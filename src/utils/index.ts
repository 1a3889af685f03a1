import * as path from "path";
import { realpath, stat } from "fs/promises";
import chalk from "chalk";

// ============================================================================
// Logging
// ============================================================================

export const log = {
  info(message: string): void {
    console.log(`${chalk.blue("[INFO]")} ${message}`);
  },
  success(message: string): void {
    console.log(`${chalk.green("[SUCCESS]")} ${message}`);
  },
  warning(message: string): void {
    console.warn(`${chalk.yellow("[WARNING]")} ${message}`);
  },
  error(message: string): void {
    console.error(`${chalk.red("[ERROR]")} ${message}`);
  },
};

// ============================================================================
// Error Handling
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Standard error handler for CLI commands.
 * Formats and displays the error, then exits with code 1.
 */
export function handleCommandError(error: unknown): never {
  log.error(errorMessage(error));
  process.exit(1);
}

// ============================================================================
// Repository Discovery
// ============================================================================

export class RepositoryNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepositoryNotFoundError";
  }
}

async function hasGitDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await stat(path.join(dirPath, ".git"));
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walk up from `startPath` (default: the current directory) to the first
 * directory holding a `.git` directory.
 *
 * @throws RepositoryNotFoundError if the filesystem root is reached first
 */
export async function findRepositoryRoot(startPath?: string): Promise<string> {
  const start = startPath || process.cwd();

  // Resolve symlinks so the root matches the paths git reports
  let currentPath: string;
  try {
    currentPath = await realpath(start);
  } catch {
    currentPath = path.resolve(start);
  }

  const fsRoot = path.parse(currentPath).root;
  let searchPath = currentPath;

  while (searchPath !== fsRoot) {
    if (await hasGitDirectory(searchPath)) {
      return searchPath;
    }
    searchPath = path.dirname(searchPath);
  }

  throw new RepositoryNotFoundError("Not in a git repository");
}

// ============================================================================
// Worktree Naming
// ============================================================================

export function sanitizeBranchName(branch: string): string {
  return branch.replace(/[^a-zA-Z0-9._-]/gu, "-");
}

/**
 * Directory name prefix shared by every derived worktree of a repository,
 * e.g. `myrepo-` or `tmp-myrepo-`.
 */
export function worktreeNamePrefix(root: string, prefix: string = ""): string {
  return `${prefix}${path.basename(root)}-`;
}

/**
 * Map a branch to its worktree directory:
 * `feature/auth` in `/src/myrepo` becomes `/src/myrepo-feature-auth`.
 */
export function deriveWorktreePath(
  root: string,
  branch: string,
  baseDir: string = path.dirname(root),
  prefix: string = "",
): string {
  return path.resolve(
    baseDir,
    `${worktreeNamePrefix(root, prefix)}${sanitizeBranchName(branch)}`,
  );
}

/**
 * Name-based guess at whether a directory is a leftover worktree: it follows
 * the `<repo>-` naming scheme but git no longer tracks it.
 * `knownPaths` holds the resolved paths of all registered worktrees.
 */
export function looksLikeOrphan(
  candidatePath: string,
  repoName: string,
  knownPaths: ReadonlySet<string>,
): boolean {
  if (!path.basename(candidatePath).startsWith(`${repoName}-`)) {
    return false;
  }
  return !knownPaths.has(path.resolve(candidatePath));
}
