import { z } from "zod";

import { GeneratorError, UsageError, formatErrorLine, normalizeError } from "../core/errors.js";
import { createProjectRequest, generateProject } from "../core/generate.js";
import { DEFAULT_TEMPLATE, createTemplateRegistry, resolveBundledTemplatesRoot } from "../core/registry.js";
import type { TemplateRegistry } from "../core/registry.js";
import type { GenerateCommandOptions, VcsInitResult } from "../core/types.js";
import { reportGeneration } from "./generate/report.js";

const generateOptionsSchema = z.object({
  template: z.string().optional(),
  gitInit: z.boolean().optional(),
  cleanOnFailure: z.boolean().optional()
});

export interface GenerateCommandDependencies {
  cwd?: string;
  registry?: TemplateRegistry;
  initRepository?: (targetDir: string) => VcsInitResult;
}

export function normalizeTemplateIdentifier(value: string | undefined): string {
  return value ?? DEFAULT_TEMPLATE;
}

function parseOptions(rawOptions: GenerateCommandOptions): GenerateCommandOptions {
  const parsed = generateOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`Invalid option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown issue"}`);
  }
  const options: GenerateCommandOptions = {};
  if (parsed.data.template !== undefined) options.template = parsed.data.template;
  if (parsed.data.gitInit !== undefined) options.gitInit = parsed.data.gitInit;
  if (parsed.data.cleanOnFailure !== undefined) options.cleanOnFailure = parsed.data.cleanOnFailure;
  return options;
}

function reportFailure(error: GeneratorError): number {
  console.error(formatErrorLine(error));
  return error.exitCode;
}

/** Generates one project and returns the process exit code. */
export function runGenerate(
  nameArg: string,
  rawOptions: GenerateCommandOptions,
  dependencies: GenerateCommandDependencies = {}
): number {
  try {
    const options = parseOptions(rawOptions);
    const registry = dependencies.registry ?? createTemplateRegistry(resolveBundledTemplatesRoot());
    const request = createProjectRequest({
      projectName: nameArg,
      templateIdentifier: normalizeTemplateIdentifier(options.template),
      cwd: dependencies.cwd ?? process.cwd(),
      initializeGit: options.gitInit ?? true,
      cleanOnFailure: options.cleanOnFailure ?? false
    });

    const result = generateProject(request, {
      registry,
      ...(dependencies.initRepository ? { initRepository: dependencies.initRepository } : {})
    });
    reportGeneration(result);
    return 0;
  } catch (error) {
    return reportFailure(normalizeError(error));
  }
}
