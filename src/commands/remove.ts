import { Command } from "commander";
import { WorktreeManager, resolveWorktreeTarget } from "../git/WorktreeManager";
import type { RepositoryContext } from "../models";
import { handleCommandError, log } from "../utils";

interface RemoveCommandOptions {
  force: boolean;
}

export function createRemoveCommand(): Command {
  const command = new Command("remove");

  command
    .description("Remove a worktree")
    .argument("<target>", "Worktree path or branch name")
    .option(
      "-f, --force",
      "Remove the worktree even if it has uncommitted changes",
      false,
    )
    .action(async (target: string, options: RemoveCommandOptions) => {
      try {
        if (!target || !target.trim()) {
          throw new Error("Worktree path or branch name required");
        }
        const context = await WorktreeManager.discover();
        await removeWorktree(context, target, options.force);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

export async function removeWorktree(
  context: RepositoryContext,
  target: string,
  force: boolean,
): Promise<string> {
  if (!target || !target.trim()) {
    throw new Error("Worktree path or branch name required");
  }

  const worktreePath = await resolveWorktreeTarget(context.git, target);
  if (!worktreePath) {
    throw new Error(`No worktree found for branch '${target}'`);
  }

  log.info(`Removing worktree at: ${worktreePath}`);
  await context.git.removeWorktree(worktreePath, force);
  log.success(`Worktree removed: ${worktreePath}`);

  return worktreePath;
}
