export type { GenerationStage, TemplateIdentifier } from "./types/common.js";
export type { TemplateDefinition, TemplateDescriptor } from "./types/template.js";
export type {
  CopySummary,
  GenerateCommandOptions,
  GenerationResult,
  ProjectRequest,
  RewriteSummary,
  VcsInitResult
} from "./types/generation.js";
