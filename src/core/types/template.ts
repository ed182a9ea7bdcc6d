import type { TemplateIdentifier } from "./common.js";

export interface TemplateDefinition {
  id: TemplateIdentifier;
  /** Directory name of the bundle under the templates root. */
  bundle: string;
  /** Placeholder module name baked into the bundle's sources and tests. */
  moduleName: string;
  summary: string;
}

export interface TemplateDescriptor {
  identifier: TemplateIdentifier;
  bundleLocation: string;
  internalModuleName: string;
  summary: string;
}
