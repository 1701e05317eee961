/**
 * Failure kinds raised during an analysis run.
 *
 * - configuration: invalid or unreadable config (fatal, before any work)
 * - schema-init: the store could not be recreated (fatal)
 * - parse: a source file has syntax errors (file skipped)
 * - record-insert: a single record was rejected by the store (record skipped)
 */
export type AnalysisErrorKind =
  | "configuration"
  | "schema-init"
  | "parse"
  | "record-insert";

export interface AnalysisErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every error the analyzer raises on purpose.
 * The `kind` discriminator decides whether a run can continue.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  constructor(message: string, options?: AnalysisErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Fatal errors abort the run; the store must not be consumed afterwards. */
  get fatal(): boolean {
    return this.kind === "configuration" || this.kind === "schema-init";
  }
}

export class ConfigurationError extends AnalysisError {
  readonly kind = "configuration";
}

export class SchemaInitError extends AnalysisError {
  readonly kind = "schema-init";
}

export class ParseError extends AnalysisError {
  readonly kind = "parse";

  constructor(
    readonly filePath: string,
    readonly diagnostics: string[],
    options?: AnalysisErrorOptions,
  ) {
    super(
      `Syntax errors in ${filePath}: ${diagnostics.slice(0, 3).join("; ")}`,
      options,
    );
  }
}

export class RecordInsertError extends AnalysisError {
  readonly kind = "record-insert";

  constructor(
    readonly record: string,
    message: string,
    options?: AnalysisErrorOptions,
  ) {
    super(`Rejected ${record}: ${message}`, options);
  }
}

/**
 * Extract a message from anything that was thrown.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
