import { existsSync, readFileSync, readdirSync, renameSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { RewriteIOError, describeIoError } from "./errors.js";
import type { RewriteSummary } from "./types.js";

export const PROJECT_LAYOUT = {
  sourceRoot: "src",
  testsDir: "tests",
  manifest: "pyproject.toml",
  testPackageInit: "__init__.py"
} as const;

const NAME_FIELD_PATTERN = /^([ \t]*name[ \t]*=[ \t]*)(["'])[^"'\r\n]*\2/m;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const TABLE_HEADER_PATTERN = /^[ \t]*\[\[?[ \t]*([^\]]+?)[ \t]*\]\]?[ \t]*(?:#.*)?\r?$/;
const ENTRY_POINT_TABLES: readonly string[] = ["project.scripts", "project.gui-scripts"];
const ENTRY_POINT_GROUP_PREFIX = "project.entry-points.";
const FIRST_PARTY_KEY_PATTERN = /^[ \t]*known-first-party[ \t]*=/;

function isEntryPointTable(table: string): boolean {
  const normalized = table.replace(/[ \t]/g, "");
  return ENTRY_POINT_TABLES.includes(normalized) || normalized.startsWith(ENTRY_POINT_GROUP_PREFIX);
}

/**
 * Rewrites the manifest's first `name = "..."` field, entry-point values under `[project.scripts]`,
 * `[project.gui-scripts]` and `[project.entry-points.*]` (e.g. `hello_world.main:run`), `src/<old>`
 * package paths and the module's entry in `known-first-party`. Other mentions of the module name, such
 * as keywords or URLs, are left alone.
 */
export function rewriteManifestContent(content: string, oldModuleName: string, newModuleName: string): string {
  const oldToken = escapeRegExp(oldModuleName);
  const entryPoint = new RegExp(`^([ \\t]*[^=#\\s][^=]*=[ \\t]*)(["'])${oldToken}(?=[.:])`);
  const quotedName = new RegExp(`(["'])${oldToken}\\1`, "g");

  const named = content.replace(
    NAME_FIELD_PATTERN,
    (_match, prefix: string, quote: string) => `${prefix}${quote}${newModuleName}${quote}`
  );

  let table = "";
  let inFirstPartyList = false;
  const withEntries = named
    .split("\n")
    .map((line) => {
      if (!inFirstPartyList) {
        const header = TABLE_HEADER_PATTERN.exec(line);
        if (header) {
          table = header[1] ?? "";
          return line;
        }
        inFirstPartyList = FIRST_PARTY_KEY_PATTERN.test(line);
      }
      if (inFirstPartyList) {
        if (line.includes("]")) inFirstPartyList = false;
        return line.replace(quotedName, (_match, quote: string) => `${quote}${newModuleName}${quote}`);
      }
      if (!isEntryPointTable(table)) return line;
      return line.replace(
        entryPoint,
        (_match, prefix: string, quote: string) => `${prefix}${quote}${newModuleName}`
      );
    })
    .join("\n");

  return withEntries.replace(
    new RegExp(`(["'/])${PROJECT_LAYOUT.sourceRoot}/${oldToken}(?=["'/])`, "g"),
    (_match, boundary: string) => `${boundary}${PROJECT_LAYOUT.sourceRoot}/${newModuleName}`
  );
}

export function rewriteTestImports(content: string, oldModuleName: string, newModuleName: string): string {
  const oldToken = escapeRegExp(oldModuleName);
  return content
    .replace(new RegExp(`\\bfrom([ \\t]+)${oldToken}(?=[.\\s])`, "g"), (_match, gap: string) => `from${gap}${newModuleName}`)
    .replace(
      new RegExp(`\\bimport([ \\t]+)${oldToken}(?![\\w])`, "g"),
      (_match, gap: string) => `import${gap}${newModuleName}`
    );
}

function renameModuleDirectory(destination: string, oldModuleName: string, newModuleName: string): boolean {
  if (oldModuleName === newModuleName) return false;
  const oldPath = join(destination, PROJECT_LAYOUT.sourceRoot, oldModuleName);
  const newPath = join(destination, PROJECT_LAYOUT.sourceRoot, newModuleName);
  if (!existsSync(oldPath)) return false;
  if (existsSync(newPath)) {
    throw new RewriteIOError(
      `Cannot rename ${PROJECT_LAYOUT.sourceRoot}/${oldModuleName}: ${PROJECT_LAYOUT.sourceRoot}/${newModuleName} already exists.`
    );
  }
  renameSync(oldPath, newPath);
  return true;
}

function rewriteFile(path: string, transform: (content: string) => string): boolean {
  const content = readFileSync(path, "utf8");
  const next = transform(content);
  if (next === content) return false;
  writeFileSync(path, next, "utf8");
  return true;
}

function rewriteManifest(destination: string, oldModuleName: string, newModuleName: string): boolean {
  const manifestPath = join(destination, PROJECT_LAYOUT.manifest);
  if (!existsSync(manifestPath)) return false;
  return rewriteFile(manifestPath, (content) => rewriteManifestContent(content, oldModuleName, newModuleName));
}

function rewriteTestsDirectory(destination: string, oldModuleName: string, newModuleName: string): string[] {
  const testsDir = join(destination, PROJECT_LAYOUT.testsDir);
  if (!existsSync(testsDir)) return [];

  const updated: string[] = [];
  for (const name of readdirSync(testsDir).sort()) {
    if (name === PROJECT_LAYOUT.testPackageInit) continue;
    const path = join(testsDir, name);
    if (!statSync(path).isFile()) continue;
    if (rewriteFile(path, (content) => rewriteTestImports(content, oldModuleName, newModuleName))) {
      updated.push(`${PROJECT_LAYOUT.testsDir}/${name}`);
    }
  }
  return updated;
}

export function rewriteProjectIdentifiers(
  destination: string,
  oldModuleName: string,
  newModuleName: string
): RewriteSummary {
  try {
    const renamedModuleDirectory = renameModuleDirectory(destination, oldModuleName, newModuleName);
    const manifestUpdated = rewriteManifest(destination, oldModuleName, newModuleName);
    const updatedTestFiles = rewriteTestsDirectory(destination, oldModuleName, newModuleName);
    return { renamedModuleDirectory, manifestUpdated, updatedTestFiles };
  } catch (error) {
    if (error instanceof RewriteIOError) throw error;
    throw new RewriteIOError(`Failed to rename module to '${newModuleName}': ${describeIoError(error)}`, {
      cause: error
    });
  }
}
