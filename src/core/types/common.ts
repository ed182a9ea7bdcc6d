export type TemplateIdentifier = "hello_world" | "advanced" | "nlp" | "langchain" | "llama";

export type GenerationStage =
  | "validating"
  | "checking-destination"
  | "resolving-template"
  | "copying"
  | "rewriting"
  | "initializing-vcs"
  | "reporting";
