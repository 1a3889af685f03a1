import { Command } from "commander";
import type { Dirent } from "fs";
import * as path from "path";
import { readdir, realpath, rm } from "fs/promises";
import confirm from "@inquirer/confirm";
import { WorktreeManager } from "../git/WorktreeManager";
import type { CleanupOptions, RepositoryContext } from "../models";
import { handleCommandError, log, looksLikeOrphan } from "../utils";

export type ConfirmFn = (message: string) => Promise<boolean>;

export interface CleanupResult {
  orphans: string[];
  removed: string[];
}

export function createCleanupCommand(): Command {
  const command = new Command("cleanup");

  command
    .description("Prune stale references and remove orphaned worktree directories")
    .option("-f, --force", "Delete orphaned directories without asking", false)
    .option("-d, --base-dir <dir>", "Directory to scan (default: parent of the repository)")
    .action(async (options: CleanupOptions) => {
      try {
        const context = await WorktreeManager.discover();
        await cleanupWorktrees(context, options);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

const askToRemove: ConfirmFn = (message) =>
  confirm({ message, default: false });

async function resolveExisting(target: string): Promise<string> {
  try {
    return await realpath(target);
  } catch {
    return path.resolve(target);
  }
}

/**
 * Directories directly under `baseDir` that follow the worktree naming
 * scheme but are not registered worktrees.
 */
export async function findOrphanedDirectories(
  baseDir: string,
  repoName: string,
  registeredPaths: readonly string[],
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(baseDir, { withFileTypes: true });
  } catch {
    return [];
  }

  const scanRoot = await resolveExisting(baseDir);
  const knownPaths = new Set<string>();
  for (const registered of registeredPaths) {
    knownPaths.add(await resolveExisting(registered));
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(scanRoot, entry.name))
    .filter((candidate) => looksLikeOrphan(candidate, repoName, knownPaths))
    .sort();
}

export async function cleanupWorktrees(
  context: RepositoryContext,
  options: CleanupOptions,
  ask: ConfirmFn = askToRemove,
): Promise<CleanupResult> {
  log.info("Cleaning up stale worktrees...");

  const pruned = await context.git.pruneWorktrees();
  if (pruned) {
    console.log(pruned);
  }

  const worktrees = await context.git.listWorktrees();
  const baseDir = options.baseDir
    ? path.resolve(options.baseDir)
    : path.dirname(context.root);

  const orphans = await findOrphanedDirectories(
    baseDir,
    context.repoName,
    worktrees.map((wt) => wt.path),
  );

  if (orphans.length === 0) {
    log.success("No orphaned worktree directories found");
    return { orphans, removed: [] };
  }

  log.warning(`Found ${orphans.length} potentially orphaned directories:`);
  for (const dir of orphans) {
    console.log(`  - ${dir}`);
  }

  if (!options.force && !(await ask("Remove these directories?"))) {
    log.info("Cleanup cancelled");
    return { orphans, removed: [] };
  }

  for (const dir of orphans) {
    log.info(`Removing orphaned directory: ${dir}`);
    await rm(dir, { recursive: true, force: true });
  }
  log.success(`Cleaned up ${orphans.length} orphaned directories`);

  return { orphans, removed: orphans };
}
