/**
 * Pipeline error taxonomy.
 *
 * ConfigurationError and ConsolidationError are fatal and reach the CLI.
 * CorruptArchiveError and SchemaMismatchError are recovered where they occur.
 */

export type PipelineErrorCode =
  | 'CONFIGURATION'
  | 'CORRUPT_ARCHIVE'
  | 'SCHEMA_MISMATCH'
  | 'CONSOLIDATION';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  /** Fatal errors abort the run; the others are handled per archive or per table */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION';
  readonly fatal = true;
}

export class CorruptArchiveError extends PipelineError {
  readonly code = 'CORRUPT_ARCHIVE';
  readonly fatal = false;

  constructor(
    readonly archivePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot read archive ${archivePath}: ${detail}`, options);
  }
}

export class SchemaMismatchError extends PipelineError {
  readonly code = 'SCHEMA_MISMATCH';
  readonly fatal = false;

  constructor(
    readonly source: string,
    readonly missingColumns: readonly string[]
  ) {
    super(`Columns missing in ${source}: ${missingColumns.join(', ')}`);
  }
}

export class ConsolidationError extends PipelineError {
  readonly code = 'CONSOLIDATION';
  readonly fatal = true;
}

export function isFatalPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError && error.fatal;
}
