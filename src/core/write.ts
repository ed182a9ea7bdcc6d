import { spawnSync } from "node:child_process";
import { chmodSync, constants, copyFileSync, mkdirSync, readdirSync, statSync } from "node:fs";
import { join, posix } from "node:path";

import { CopyIOError, DestinationExistsError, describeIoError } from "./errors.js";
import type { CopySummary, VcsInitResult } from "./types.js";

export const DEFAULT_EXCLUDE_PATTERNS: ReadonlySet<string> = new Set([
  "__pycache__",
  ".pytest_cache",
  ".ruff_cache",
  ".mypy_cache",
  ".venv",
  "venv",
  ".git",
  "uv.lock",
  "*.pyc"
]);

export function isExcludedEntry(name: string, patterns: ReadonlySet<string>): boolean {
  if (patterns.has(name)) return true;
  for (const pattern of patterns) {
    if (pattern.startsWith("*.") && name.endsWith(pattern.slice(1))) return true;
  }
  return false;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Copies a template bundle into a destination that must not exist yet. The destination itself is
 * created without `recursive`, so a directory created concurrently by another run is reported as
 * `DestinationExistsError` rather than merged into.
 */
export function copyTemplateTree(
  source: string,
  destination: string,
  excludePatterns: ReadonlySet<string> = DEFAULT_EXCLUDE_PATTERNS
): CopySummary {
  const summary: CopySummary = { files: 0, directories: 0, skipped: [] };

  try {
    mkdirSync(destination);
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      throw new DestinationExistsError(`Folder ${destination} already exists.`, { cause: error });
    }
    throw new CopyIOError(`Failed to create ${destination}: ${describeIoError(error)}`, { cause: error });
  }

  function walk(sourceDir: string, targetDir: string, relativeDir: string): void {
    let entries: string[];
    try {
      entries = readdirSync(sourceDir).sort();
    } catch (error) {
      throw new CopyIOError(`Failed to read template directory: ${describeIoError(error)}`, { cause: error });
    }

    for (const name of entries) {
      const relativePath = relativeDir ? posix.join(relativeDir, name) : name;
      if (isExcludedEntry(name, excludePatterns)) {
        summary.skipped.push(relativePath);
        continue;
      }

      const sourcePath = join(sourceDir, name);
      const targetPath = join(targetDir, name);
      try {
        // statSync follows symlinks, so a dangling link surfaces here as ENOENT.
        const stats = statSync(sourcePath);
        if (stats.isDirectory()) {
          mkdirSync(targetPath);
          summary.directories += 1;
          walk(sourcePath, targetPath, relativePath);
          continue;
        }
        if (!stats.isFile()) {
          summary.skipped.push(relativePath);
          continue;
        }
        copyFileSync(sourcePath, targetPath, constants.COPYFILE_EXCL);
        // Keep executable bits; the copy is owned by the user, so it stays owner-writable.
        chmodSync(targetPath, (stats.mode & 0o7777) | 0o200);
        summary.files += 1;
      } catch (error) {
        if (error instanceof CopyIOError) throw error;
        throw new CopyIOError(`Failed to copy ${relativePath}: ${describeIoError(error)}`, { cause: error });
      }
    }
  }

  walk(source, destination, "");
  return summary;
}

export function ensureGitInit(targetDir: string): VcsInitResult {
  const result = spawnSync("git", ["init"], {
    cwd: targetDir,
    encoding: "utf8"
  });

  if (result.error) {
    return { status: "ignored", reason: result.error.message };
  }

  if (result.status !== 0) {
    return {
      status: "ignored",
      reason: (result.stderr || result.stdout || "git init failed").trim()
    };
  }

  return { status: "initialized" };
}
