import { Command } from "commander";
import { spawn } from "child_process";
import { WorktreeManager, resolveWorktreeTarget } from "../git/WorktreeManager";
import type { RepositoryContext } from "../models";
import { handleCommandError, log } from "../utils";
import { listWorktrees } from "./list";

const FALLBACK_SHELL = "/bin/bash";

export function createSwitchCommand(): Command {
  const command = new Command("switch");

  command
    .description("Open a shell in the worktree for a branch")
    .argument("<branch>", "Branch name (or worktree path)")
    .action(async (branch: string) => {
      try {
        if (!branch || !branch.trim()) {
          throw new Error("Branch name required");
        }
        const context = await WorktreeManager.discover();
        const worktreePath = await findSwitchTarget(context, branch);
        log.success(`Switching to worktree: ${worktreePath}`);
        await launchInteractiveShell(worktreePath);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

/**
 * Resolve the worktree to switch into; on a miss the available worktrees
 * are listed before failing.
 */
export async function findSwitchTarget(
  context: RepositoryContext,
  branch: string,
): Promise<string> {
  const worktreePath = await resolveWorktreeTarget(context.git, branch, {
    registeredOnly: true,
  });
  if (worktreePath) {
    return worktreePath;
  }

  await listWorktrees(context);
  throw new Error(`No worktree found for branch '${branch}'`);
}

/**
 * Hand the terminal to the user's shell inside `worktreePath`. The process
 * exits with the shell's exit code; control never returns to the caller.
 */
export async function launchInteractiveShell(worktreePath: string): Promise<never> {
  const shell = process.env.SHELL || FALLBACK_SHELL;

  const child = spawn(shell, [], {
    cwd: worktreePath,
    stdio: "inherit",
  });

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.on("close", (code) => resolve(code ?? 0));
    child.on("error", reject);
  });

  process.exit(exitCode);
}
