import { Command } from "commander";

import { runGenerate } from "./commands/generate.js";
import { formatErrorLine, normalizeError } from "./core/errors.js";
import { DEFAULT_TEMPLATE, TEMPLATE_DEFINITIONS } from "./core/registry.js";
import type { GenerateCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;
const TEMPLATE_CHOICES = TEMPLATE_DEFINITIONS.map((definition) => definition.id).join(" | ");

program
  .name("fastapi-kit")
  .description("Create a new FastAPI project with NAME using TEMPLATE.")
  .version(CLI_VERSION)
  .argument("<name>", "Project name; letters, digits and underscores only")
  .option("-t, --template <template>", `Project template: ${TEMPLATE_CHOICES}`, DEFAULT_TEMPLATE)
  .option("--git-init", "Run git init in the new project", true)
  .option("--no-git-init", "Skip git initialization")
  .option("--clean-on-failure", "Remove the partially generated folder when copying or renaming fails", false)
  .action((nameArg: string, rawOptions: GenerateCommandOptions) => {
    process.exitCode = runGenerate(nameArg, rawOptions);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    console.error(formatErrorLine(normalized));
    process.exitCode = normalized.exitCode;
  }
}

void main();
