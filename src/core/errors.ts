import type { GenerationStage } from "./types.js";

const EXIT_CODE_FAILURE = 1;

export type GeneratorErrorCode =
  | "INVALID_NAME"
  | "DESTINATION_EXISTS"
  | "TEMPLATE_NOT_FOUND"
  | "COPY_IO"
  | "REWRITE_IO"
  | "USAGE"
  | "UNEXPECTED";

interface GeneratorErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class GeneratorError extends Error {
  readonly code: GeneratorErrorCode;
  readonly exitCode: number;
  readonly stage: GenerationStage | null;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: GeneratorErrorCode,
    stage: GenerationStage | null,
    options: GeneratorErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = EXIT_CODE_FAILURE;
    this.stage = stage;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class InvalidNameError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "INVALID_NAME", "validating", options);
  }
}

export class DestinationExistsError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "DESTINATION_EXISTS", "checking-destination", options);
  }
}

/** Raised when an identifier is not enumerated or its bundle is missing from the installation. */
export class TemplateNotFoundError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "TEMPLATE_NOT_FOUND", "resolving-template", options);
  }
}

export class CopyIOError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "COPY_IO", "copying", options);
  }
}

export class RewriteIOError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "REWRITE_IO", "rewriting", options);
  }
}

export class UsageError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "USAGE", null, options);
  }
}

export class UnexpectedError extends GeneratorError {
  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(message, "UNEXPECTED", null, options);
  }
}

export function normalizeError(error: unknown): GeneratorError {
  if (error instanceof GeneratorError) return error;
  if (error instanceof Error) {
    return new UnexpectedError(error.message, { cause: error });
  }
  return new UnexpectedError(String(error));
}

/** Errno-style message of an fs failure, e.g. `EACCES: permission denied, open '/x'`. */
export function describeIoError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLine(error: GeneratorError): string {
  const message = error.message.replace(/\s*\r?\n\s*/g, " ").trim();
  return `Error: ${message}`;
}
