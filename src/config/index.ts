import * as path from "path";
import { copyFile, mkdir, readFile, stat, writeFile } from "fs/promises";
import type { CopyReport } from "../models";
import { errorMessage, log } from "../utils";

export const CONFIG_FILE_NAME = ".worktree-config";

export const CONFIG_FILE_HEADER = [
  "# Worktree manager configuration",
  "# Files copied into new worktrees, one path per line relative to the repository root",
] as const;

export const DEFAULT_CONFIG_FILES: readonly string[] = [
  ".env",
  ".env.local",
  ".env.development",
  ".env.test",
  ".vscode/settings.json",
  ".vscode/launch.json",
  "config/local.json",
  "config/development.json",
  ".taskmaster/config.json",
  ".mcp.json",
];

export function getConfigPath(root: string): string {
  return path.join(root, CONFIG_FILE_NAME);
}

/**
 * Every non-blank line that is not a `#` comment is an entry, kept verbatim.
 */
export function parseConfigFile(content: string): string[] {
  return content
    .split("\n")
    .filter((line) => line !== "" && !line.trimStart().startsWith("#"));
}

export function serializeConfigFile(files: readonly string[]): string {
  return [...CONFIG_FILE_HEADER, ...files].join("\n") + "\n";
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export interface LoadedConfig {
  files: string[];
  /** Set when the file exists but could not be read; `files` are the defaults. */
  readError?: string;
}

/**
 * Read the configured file list. Falls back to the defaults when the file is
 * missing or cannot be read; the file itself is left untouched.
 */
export async function loadConfig(root: string): Promise<LoadedConfig> {
  const configPath = getConfigPath(root);
  try {
    const content = await readFile(configPath, "utf-8");
    return { files: parseConfigFile(content) };
  } catch (error) {
    if (isNotFound(error)) {
      return { files: [...DEFAULT_CONFIG_FILES] };
    }
    log.warning(
      `Could not read ${configPath} (${errorMessage(error)}), using default config files`,
    );
    return { files: [...DEFAULT_CONFIG_FILES], readError: errorMessage(error) };
  }
}

export async function loadConfigFiles(root: string): Promise<string[]> {
  return (await loadConfig(root)).files;
}

export async function saveConfigFiles(
  root: string,
  files: readonly string[],
): Promise<void> {
  await writeFile(getConfigPath(root), serializeConfigFile(files));
}

export function addConfigEntry(
  files: readonly string[],
  entry: string,
): { files: string[]; added: boolean } {
  if (files.includes(entry)) {
    return { files: [...files], added: false };
  }
  return { files: [...files, entry], added: true };
}

export function removeConfigEntry(
  files: readonly string[],
  entry: string,
): { files: string[]; removed: boolean } {
  const index = files.indexOf(entry);
  if (index === -1) {
    return { files: [...files], removed: false };
  }
  return {
    files: [...files.slice(0, index), ...files.slice(index + 1)],
    removed: true,
  };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function describeConfigFiles(
  root: string,
  files: readonly string[],
): Promise<Array<{ file: string; found: boolean }>> {
  const entries: Array<{ file: string; found: boolean }> = [];
  for (const file of files) {
    entries.push({ file, found: await isFile(path.join(root, file)) });
  }
  return entries;
}

/**
 * Copy each listed file from `sourceRoot` into the same relative location
 * under `targetRoot`. Missing sources are skipped; a failed copy is recorded
 * and the remaining files are still attempted.
 */
export async function copyConfigFiles(
  sourceRoot: string,
  targetRoot: string,
  files: readonly string[],
): Promise<CopyReport> {
  const report: CopyReport = { copied: [], skipped: [], failed: [] };

  if (files.length === 0) {
    return report;
  }

  log.info("Copying config files to worktree...");

  for (const file of files) {
    const sourcePath = path.join(sourceRoot, file);
    const targetPath = path.join(targetRoot, file);

    if (!(await isFile(sourcePath))) {
      log.info(`  - Skipped: ${file} (not found)`);
      report.skipped.push(file);
      continue;
    }

    try {
      await mkdir(path.dirname(targetPath), { recursive: true });
      await copyFile(sourcePath, targetPath);
      log.info(`  ✓ Copied: ${file}`);
      report.copied.push(file);
    } catch (error) {
      log.warning(`  ✗ Failed to copy: ${file}`);
      report.failed.push({ file, error: errorMessage(error) });
    }
  }

  if (report.copied.length > 0) {
    log.success(`Copied ${report.copied.length} config files`);
  }
  if (report.failed.length > 0) {
    log.warning(`Failed to copy ${report.failed.length} config files`);
  }

  return report;
}
