import { Command } from "commander";
import { WorktreeManager } from "../git/WorktreeManager";
import type { RepositoryContext } from "../models";
import { handleCommandError, log } from "../utils";

export function createPruneCommand(): Command {
  const command = new Command("prune");

  command
    .description("Prune references to worktrees whose directories are gone")
    .action(async () => {
      try {
        const context = await WorktreeManager.discover();
        await pruneWorktrees(context);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

export async function pruneWorktrees(context: RepositoryContext): Promise<void> {
  log.info("Pruning worktree references...");
  const output = await context.git.pruneWorktrees();
  if (output) {
    console.log(output);
  }
  log.success("Pruning complete");
}
