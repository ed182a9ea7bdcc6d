import { existsSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import type { TemplateDefinition, TemplateDescriptor, TemplateIdentifier } from "./types.js";

export const DEFAULT_TEMPLATE: TemplateIdentifier = "hello_world";

export const TEMPLATE_DEFINITIONS: readonly TemplateDefinition[] = [
  {
    id: "hello_world",
    bundle: "template-hello-world",
    moduleName: "hello_world",
    summary: "Minimal REST API with typed request/response models."
  },
  {
    id: "advanced",
    bundle: "template-advanced",
    moduleName: "advanced",
    summary: "Settings, dependency injection, background tasks and custom error handlers."
  },
  {
    id: "nlp",
    bundle: "template-nlp",
    moduleName: "nlp",
    summary: "Summarization and named-entity recognition endpoints backed by transformers."
  },
  {
    id: "langchain",
    bundle: "template-langchain",
    moduleName: "langchain_app",
    summary: "Question answering over a prompt chain built with LangChain."
  },
  {
    id: "llama",
    bundle: "template-llama",
    moduleName: "llama_app",
    summary: "Local text generation with a GGUF model through llama.cpp."
  }
];

export interface TemplateRegistry {
  readonly root: string;
  readonly identifiers: readonly TemplateIdentifier[];
  list(): readonly TemplateDescriptor[];
  resolve(identifier: string): TemplateDescriptor | null;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function createTemplateRegistry(
  bundleRoot: string,
  definitions: readonly TemplateDefinition[] = TEMPLATE_DEFINITIONS
): TemplateRegistry {
  const root = resolve(bundleRoot);
  const descriptors = new Map<string, TemplateDescriptor>();
  for (const definition of definitions) {
    if (descriptors.has(definition.id)) {
      throw new Error(`Template identifier "${definition.id}" is declared more than once.`);
    }
    descriptors.set(
      definition.id,
      Object.freeze({
        identifier: definition.id,
        bundleLocation: join(root, definition.bundle),
        internalModuleName: definition.moduleName,
        summary: definition.summary
      })
    );
  }
  const identifiers = Object.freeze(definitions.map((definition) => definition.id));
  const listed = Object.freeze(Array.from(descriptors.values()));

  return Object.freeze({
    root,
    identifiers,
    list: () => listed,
    resolve(identifier: string): TemplateDescriptor | null {
      const descriptor = descriptors.get(identifier);
      if (!descriptor) return null;
      // An enumerated template whose bundle was not shipped is treated as unknown.
      return isDirectory(descriptor.bundleLocation) ? descriptor : null;
    }
  });
}

/**
 * Locates the `templates/` directory shipped at the package root. The bundled CLI runs from `dist/`,
 * sources run from `src/core/`, so both depths are probed.
 */
export function resolveBundledTemplatesRoot(moduleUrl: string = import.meta.url): string {
  const moduleDir = dirname(fileURLToPath(moduleUrl));
  const installed = resolve(moduleDir, "..", "templates");
  const development = resolve(moduleDir, "..", "..", "templates");
  if (existsSync(installed)) return installed;
  return existsSync(development) ? development : installed;
}
