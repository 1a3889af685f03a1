import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import chalk from "chalk";
import { WorktreeManager, DEFAULT_REMOTE } from "../git/WorktreeManager";
import { copyConfigFiles, loadConfigFiles } from "../config";
import type {
  BranchSource,
  CopyReport,
  CreateOptions,
  RepositoryContext,
  WorktreeBackend,
} from "../models";
import { deriveWorktreePath, handleCommandError, log } from "../utils";

export interface CreateResult {
  path: string;
  source: BranchSource;
  copy: CopyReport | null;
}

export function createCreateCommand(): Command {
  const command = new Command("create");

  command
    .description("Create a new worktree for a branch")
    .argument("<branch>", "Branch to check out (local, remote or new)")
    .argument("[path]", "Worktree directory (derived from the branch when omitted)")
    .option("-d, --base-dir <dir>", "Base directory for worktrees (default: parent of the repository)")
    .option("-p, --prefix <prefix>", "Prefix for the worktree directory name")
    .option("-f, --force", "Skip the check for an existing target directory", false)
    .option("-c, --copy-configs", "Copy config files into the new worktree", true)
    .option("--no-copy-configs", "Skip copying config files")
    .option("--config-files <files>", "Comma-separated list of config files to copy")
    .action(async (branch: string, customPath: string | undefined, options: CreateOptions) => {
      try {
        if (!branch || !branch.trim()) {
          throw new Error("Branch name required");
        }
        const context = await WorktreeManager.discover();
        await createWorktree(context, branch, customPath, options);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

/**
 * Pick how the worktree gets its branch: reuse a local branch, track the
 * remote one, or branch off the default branch.
 */
export async function resolveBranchSource(
  git: WorktreeBackend,
  branch: string,
): Promise<BranchSource> {
  if (await git.refExists(`refs/heads/${branch}`)) {
    return { kind: "local", branch };
  }

  if (await git.refExists(`refs/remotes/${DEFAULT_REMOTE}/${branch}`)) {
    return { kind: "remote", branch, remoteRef: `${DEFAULT_REMOTE}/${branch}` };
  }

  return { kind: "new", branch, startPoint: await git.getDefaultBranch() };
}

/**
 * Split a `--config-files` value; surrounding whitespace and empty entries
 * are dropped.
 */
export function parseConfigFilesOption(value: string): string[] {
  return value
    .split(",")
    .map((file) => file.trim())
    .filter((file) => file.length > 0);
}

export async function createWorktree(
  context: RepositoryContext,
  branch: string,
  customPath: string | undefined,
  options: CreateOptions,
): Promise<CreateResult> {
  if (!branch || !branch.trim()) {
    throw new Error("Branch name required");
  }

  const worktreePath = customPath
    ? path.resolve(customPath)
    : deriveWorktreePath(
        context.root,
        branch,
        options.baseDir ? path.resolve(options.baseDir) : undefined,
        options.prefix,
      );

  log.info(`Creating worktree for branch '${branch}' at '${worktreePath}'`);

  if (fs.existsSync(worktreePath) && !options.force) {
    throw new Error(
      `Directory '${worktreePath}' already exists. Use --force to override.`,
    );
  }

  const source = await resolveBranchSource(context.git, branch);
  switch (source.kind) {
    case "local":
      log.info(`Branch '${branch}' exists locally`);
      break;
    case "remote":
      log.info(`Branch '${branch}' exists on remote, creating local tracking branch`);
      break;
    case "new":
      log.info(`Creating new branch '${branch}' from '${source.startPoint}'`);
      break;
  }

  await context.git.addWorktree(worktreePath, source);

  let copy: CopyReport | null = null;
  if (options.copyConfigs) {
    const files = options.configFiles !== undefined
      ? parseConfigFilesOption(options.configFiles)
      : await loadConfigFiles(context.root);
    copy = await copyConfigFiles(context.root, worktreePath, files);
  }

  log.success(`Worktree created at: ${worktreePath}`);
  log.info(`To switch to this worktree: ${chalk.cyan(`cd '${worktreePath}'`)}`);

  return { path: worktreePath, source, copy };
}
