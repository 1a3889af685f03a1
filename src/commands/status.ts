import { Command } from "commander";
import chalk from "chalk";
import { WorktreeManager } from "../git/WorktreeManager";
import type { RepositoryContext } from "../models";
import { errorMessage, handleCommandError, log } from "../utils";

export function createStatusCommand(): Command {
  const command = new Command("status");

  command
    .description("Show git status for every worktree")
    .action(async () => {
      try {
        const context = await WorktreeManager.discover();
        await showStatus(context);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

/**
 * Print a short status per worktree. A worktree that cannot be queried is
 * reported and skipped.
 */
export async function showStatus(
  context: RepositoryContext,
): Promise<{ succeeded: string[]; failed: string[] }> {
  const worktrees = await context.git.listWorktrees();
  const succeeded: string[] = [];
  const failed: string[] = [];

  log.info("Worktree status overview:");

  for (const worktree of worktrees) {
    console.log();
    console.log(chalk.bold(`=== ${worktree.path} ===`));

    try {
      const status = await context.git.shortStatus(worktree.path);
      if (status) {
        console.log(status);
      }
      succeeded.push(worktree.path);
    } catch (error) {
      log.error(`Cannot access worktree: ${errorMessage(error)}`);
      failed.push(worktree.path);
    }
  }

  if (failed.length > 0) {
    log.warning(`Could not read status of ${failed.length} worktree(s)`);
  }

  return { succeeded, failed };
}
