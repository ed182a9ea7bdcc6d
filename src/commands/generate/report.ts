import { log, outro } from "@clack/prompts";

import type { GenerationResult, VcsInitResult } from "../../core/types.js";

interface NextStep {
  command: string;
  description: string;
}

const NEXT_STEPS: readonly NextStep[] = [
  { command: "make install", description: "Install dependencies" },
  { command: "make start", description: "Start the development server" },
  { command: "make test", description: "Run tests" },
  { command: "make lint", description: "Run linter" }
];

const DOCS_URL = "http://localhost:8000/docs";

export function describeVcsResult(vcs: VcsInitResult): string {
  if (vcs.status === "initialized") return "Initialized git repository.";
  if (vcs.status === "skipped") return "Skipped git initialization.";
  return `Could not initialize git repository (${vcs.reason}).`;
}

export function buildNextStepsMessage(projectName: string): string {
  const available = NEXT_STEPS.map((step) => `    ${step.command}\n    ${step.description}`).join("\n\n");
  const suggested = [`cd ${projectName}`, "make install", "make start"].map((command) => `    ${command}`).join("\n");

  return `Inside that directory, you can run several commands:

${available}

We suggest that you begin by typing:

${suggested}

Then open ${DOCS_URL} to see your API.`;
}

export function reportGeneration(result: GenerationResult): void {
  log.success(`Created ${result.projectName} at ${result.destinationPath}`);
  log.info(
    `Template '${result.template.identifier}': copied ${result.copy.files} files across ${result.copy.directories} folders.`
  );
  if (result.rewrite.renamedModuleDirectory) {
    log.info(`Renamed module '${result.template.internalModuleName}' to '${result.projectName}'.`);
  }

  const vcsSummary = describeVcsResult(result.vcs);
  if (result.vcs.status === "ignored") {
    log.warn(vcsSummary);
  } else {
    log.info(vcsSummary);
  }

  log.step(buildNextStepsMessage(result.projectName));
  outro("Happy hacking!");
}
