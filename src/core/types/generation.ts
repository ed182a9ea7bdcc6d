import type { TemplateDescriptor } from "./template.js";

export interface GenerateCommandOptions {
  template?: string;
  gitInit?: boolean;
  cleanOnFailure?: boolean;
}

export interface ProjectRequest {
  projectName: string;
  templateIdentifier: string;
  destinationPath: string;
  initializeGit: boolean;
  cleanOnFailure: boolean;
}

export interface CopySummary {
  files: number;
  directories: number;
  /** Relative paths of excluded entries, in walk order. */
  skipped: string[];
}

export interface RewriteSummary {
  renamedModuleDirectory: boolean;
  manifestUpdated: boolean;
  updatedTestFiles: string[];
}

export type VcsInitResult =
  | { status: "initialized" }
  | { status: "skipped" }
  | { status: "ignored"; reason: string };

export interface GenerationResult {
  projectName: string;
  destinationPath: string;
  template: TemplateDescriptor;
  copy: CopySummary;
  rewrite: RewriteSummary;
  vcs: VcsInitResult;
}
