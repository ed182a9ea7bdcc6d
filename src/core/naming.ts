import { z } from "zod";

export const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

// Safe both as a directory name and as a Python module identifier, so hyphens are rejected too.
export const projectNameSchema = z
  .string()
  .min(1)
  .regex(PROJECT_NAME_PATTERN, `Name must match: ${PROJECT_NAME_PATTERN.source}`);

export function isValidProjectName(name: string): boolean {
  return projectNameSchema.safeParse(name).success;
}
