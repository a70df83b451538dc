/**
 * Failure kinds surfaced by an analysis run
 */
export enum AnalysisErrorKind {
  INVALID_INPUT = 'invalid_input', // Empty or missing root path, bad CLI options
  PARSE_FAILURE = 'parse_failure', // A source file failed to parse; aborts the run
  MISSING_TOOL = 'missing_tool', // Fix mode without the external rename tool
  RENAME_FAILURE = 'rename_failure', // At least one rename failed in fix mode
}

export interface AnalysisErrorOptions {
  filePath?: string;
  cause?: unknown;
}

export class AnalysisError extends Error {
  readonly kind: AnalysisErrorKind;
  readonly filePath?: string;

  constructor(kind: AnalysisErrorKind, message: string, options: AnalysisErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AnalysisError';
    this.kind = kind;
    this.filePath = options.filePath;
  }
}

export function isAnalysisError(error: unknown, kind?: AnalysisErrorKind): error is AnalysisError {
  return error instanceof AnalysisError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
