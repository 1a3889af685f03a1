import { Command } from "commander";
import { WorktreeManager } from "../git/WorktreeManager";
import {
  DEFAULT_CONFIG_FILES,
  addConfigEntry,
  describeConfigFiles,
  getConfigPath,
  loadConfig,
  removeConfigEntry,
  saveConfigFiles,
} from "../config";
import { handleCommandError, log } from "../utils";

export type ConfigAction =
  | { kind: "list" }
  | { kind: "add"; file: string }
  | { kind: "remove"; file: string }
  | { kind: "reset" };

export interface ConfigCommandOptions {
  list?: boolean;
  add?: string;
  remove?: string;
  reset?: boolean;
}

export function createConfigCommand(): Command {
  const command = new Command("config");

  command
    .description("Manage the files copied into new worktrees")
    .option("--list", "Show the configured files (default)")
    .option("--add <file>", "Add a file to the list")
    .option("--remove <file>", "Remove a file from the list")
    .option("--reset", "Restore the default list")
    .action(async (options: ConfigCommandOptions) => {
      try {
        const action = parseConfigAction(options);
        const { root } = await WorktreeManager.discover();
        await runConfigAction(root, action);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

export function parseConfigAction(options: ConfigCommandOptions): ConfigAction {
  const actions: ConfigAction[] = [];

  if (options.list) {
    actions.push({ kind: "list" });
  }
  if (options.add !== undefined) {
    actions.push({ kind: "add", file: options.add });
  }
  if (options.remove !== undefined) {
    actions.push({ kind: "remove", file: options.remove });
  }
  if (options.reset) {
    actions.push({ kind: "reset" });
  }

  if (actions.length > 1) {
    throw new Error("Use only one of --list, --add, --remove or --reset");
  }

  const [action] = actions;
  if (!action) {
    return { kind: "list" };
  }

  if ((action.kind === "add" || action.kind === "remove") && !action.file.trim()) {
    throw new Error(`File path required for --${action.kind}`);
  }

  return action;
}

export async function runConfigAction(root: string, action: ConfigAction): Promise<string[]> {
  const { files, readError } = await loadConfig(root);

  // An unreadable file is never replaced by an edited copy of the defaults
  if (readError !== undefined && (action.kind === "add" || action.kind === "remove")) {
    throw new Error(
      `Cannot update ${getConfigPath(root)}: the file could not be read (${readError})`,
    );
  }

  switch (action.kind) {
    case "list": {
      log.info("Current config files to copy:");
      const entries = await describeConfigFiles(root, files);
      if (entries.length === 0) {
        console.log("  (none configured)");
      }
      for (const { file, found } of entries) {
        console.log(found ? `  ✓ ${file}` : `  - ${file} (not found)`);
      }
      return files;
    }

    case "add": {
      const result = addConfigEntry(files, action.file);
      if (!result.added) {
        log.warning(`File '${action.file}' already in config list`);
        return files;
      }
      await saveConfigFiles(root, result.files);
      log.success(`Configuration saved to ${getConfigPath(root)}`);
      log.success(`Added '${action.file}' to config files`);
      return result.files;
    }

    case "remove": {
      const result = removeConfigEntry(files, action.file);
      if (!result.removed) {
        log.warning(`File '${action.file}' not found in config list`);
        return files;
      }
      await saveConfigFiles(root, result.files);
      log.success(`Configuration saved to ${getConfigPath(root)}`);
      log.success(`Removed '${action.file}' from config files`);
      return result.files;
    }

    case "reset": {
      const defaults = [...DEFAULT_CONFIG_FILES];
      await saveConfigFiles(root, defaults);
      log.success(`Configuration saved to ${getConfigPath(root)}`);
      log.success("Reset config files to defaults");
      return defaults;
    }
  }
}
