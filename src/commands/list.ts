import { Command } from "commander";
import { WorktreeManager } from "../git/WorktreeManager";
import type { RepositoryContext, WorktreeRecord } from "../models";
import { handleCommandError, log } from "../utils";

const PATH_WIDTH = 50;
const BRANCH_WIDTH = 20;
const COMMIT_WIDTH = 10;
const SHORT_COMMIT_LENGTH = 7;

export function createListCommand(): Command {
  const command = new Command("list");

  command
    .description("List all worktrees")
    .action(async () => {
      try {
        const context = await WorktreeManager.discover();
        await listWorktrees(context);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

export function getWorktreeStatus(worktree: WorktreeRecord): string {
  const statuses: string[] = [];

  if (worktree.bare) {
    statuses.push("bare");
  }
  if (worktree.detached) {
    statuses.push("detached");
  }
  if (worktree.locked) {
    statuses.push("locked");
  }
  if (worktree.prunable) {
    statuses.push("prunable");
  }

  return statuses.length > 0 ? statuses.join(" ") : "clean";
}

function formatRow(pathText: string, branch: string, commit: string, status: string): string {
  return [
    pathText.padEnd(PATH_WIDTH),
    branch.padEnd(BRANCH_WIDTH),
    commit.padEnd(COMMIT_WIDTH),
    status,
  ].join(" ");
}

export function formatWorktreeTable(worktrees: readonly WorktreeRecord[]): string[] {
  const lines = [
    formatRow("PATH", "BRANCH", "COMMIT", "STATUS"),
    formatRow("----", "------", "------", "------"),
  ];

  for (const worktree of worktrees) {
    lines.push(
      formatRow(
        worktree.path,
        worktree.branch ?? "N/A",
        worktree.head.substring(0, SHORT_COMMIT_LENGTH),
        getWorktreeStatus(worktree),
      ),
    );
  }

  return lines;
}

export async function listWorktrees(context: RepositoryContext): Promise<WorktreeRecord[]> {
  const worktrees = await context.git.listWorktrees();

  log.info("Current worktrees:");
  for (const line of formatWorktreeTable(worktrees)) {
    console.log(line);
  }

  return worktrees;
}
