import { existsSync, rmSync } from "node:fs";
import { resolve } from "node:path";

import {
  CopyIOError,
  DestinationExistsError,
  GeneratorError,
  InvalidNameError,
  RewriteIOError,
  TemplateNotFoundError,
  describeIoError
} from "./errors.js";
import { PROJECT_NAME_PATTERN, isValidProjectName } from "./naming.js";
import type { TemplateRegistry } from "./registry.js";
import { rewriteProjectIdentifiers } from "./rewrite.js";
import type {
  CopySummary,
  GenerationResult,
  GenerationStage,
  ProjectRequest,
  RewriteSummary,
  VcsInitResult
} from "./types.js";
import { DEFAULT_EXCLUDE_PATTERNS, copyTemplateTree, ensureGitInit } from "./write.js";

export interface GenerationEnvironment {
  registry: TemplateRegistry;
  excludePatterns?: ReadonlySet<string>;
  initRepository?: (targetDir: string) => VcsInitResult;
  onStage?: (stage: GenerationStage) => void;
}

export interface ProjectRequestInput {
  projectName: string;
  templateIdentifier: string;
  cwd: string;
  initializeGit?: boolean;
  cleanOnFailure?: boolean;
}

export function createProjectRequest(input: ProjectRequestInput): ProjectRequest {
  return {
    projectName: input.projectName,
    templateIdentifier: input.templateIdentifier,
    destinationPath: resolve(input.cwd, input.projectName),
    initializeGit: input.initializeGit ?? true,
    cleanOnFailure: input.cleanOnFailure ?? false
  };
}

function initializeRepository(
  request: ProjectRequest,
  initRepository: (targetDir: string) => VcsInitResult
): VcsInitResult {
  if (!request.initializeGit) return { status: "skipped" };
  try {
    return initRepository(request.destinationPath);
  } catch (error) {
    return { status: "ignored", reason: describeIoError(error) };
  }
}

function removePartialOutput(destinationPath: string, failure: CopyIOError | RewriteIOError): GeneratorError {
  try {
    rmSync(destinationPath, { recursive: true, force: true });
    return failure;
  } catch (cleanupError) {
    const Failure = failure instanceof CopyIOError ? CopyIOError : RewriteIOError;
    return new Failure(`${failure.message} Cleanup of ${destinationPath} also failed: ${describeIoError(cleanupError)}`, {
      cause: failure
    });
  }
}

/**
 * Runs the generation pipeline for one request. Validation, destination and template failures happen
 * before anything is written; copy and rewrite failures may leave a partial destination behind unless
 * `cleanOnFailure` is set.
 */
export function generateProject(request: ProjectRequest, environment: GenerationEnvironment): GenerationResult {
  const enter = (stage: GenerationStage): void => environment.onStage?.(stage);

  enter("validating");
  if (!isValidProjectName(request.projectName)) {
    throw new InvalidNameError(
      `Invalid name "${request.projectName}". Name must match: ${PROJECT_NAME_PATTERN.source}`
    );
  }

  enter("checking-destination");
  if (existsSync(request.destinationPath)) {
    throw new DestinationExistsError(`Folder ${request.destinationPath} already exists.`);
  }

  enter("resolving-template");
  const template = environment.registry.resolve(request.templateIdentifier);
  if (!template) {
    throw new TemplateNotFoundError(
      `Template "${request.templateIdentifier}" not found. Available templates: ${environment.registry.identifiers.join(", ")}.`,
      { details: { templatesRoot: environment.registry.root } }
    );
  }

  enter("copying");
  let copy: CopySummary;
  let rewrite: RewriteSummary;
  try {
    copy = copyTemplateTree(
      template.bundleLocation,
      request.destinationPath,
      environment.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS
    );

    enter("rewriting");
    rewrite = rewriteProjectIdentifiers(request.destinationPath, template.internalModuleName, request.projectName);
  } catch (error) {
    if (!(error instanceof CopyIOError || error instanceof RewriteIOError)) throw error;
    throw request.cleanOnFailure ? removePartialOutput(request.destinationPath, error) : error;
  }

  enter("initializing-vcs");
  const vcs = initializeRepository(request, environment.initRepository ?? ensureGitInit);

  enter("reporting");
  return {
    projectName: request.projectName,
    destinationPath: request.destinationPath,
    template,
    copy,
    rewrite,
    vcs
  };
}
