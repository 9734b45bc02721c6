export type PipelineErrorCode =
  | "MALFORMED_RECORD"
  | "SOURCE_UNAVAILABLE"
  | "STAGING_WRITE_FAILURE"
  | "STAGING_READ_FAILURE"
  | "RECONCILIATION_INTEGRITY_VIOLATION"
  | "PARTIAL_BATCH_FAILURE"
  | "HISTORY_AUDIT_FAILURE"
  | "STAGING_CLEANUP_FAILURE"
  | "CONFIGURATION_ERROR";

export interface PipelineErrorContext {
  batchId?: string;
  trackId?: string;
  location?: string;
  [key: string]: unknown;
}

/**
 * Base class for every failure surfaced to the orchestrator's caller.
 * `context` carries what a replay needs: batch id, track id, staging location.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly context: PipelineErrorContext;

  constructor(message: string, code: PipelineErrorCode, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class MalformedRecordError extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "MALFORMED_RECORD", context, cause);
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "SOURCE_UNAVAILABLE", context, cause);
  }
}

export class StagingWriteFailure extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "STAGING_WRITE_FAILURE", context, cause);
  }
}

export class StagingReadFailure extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "STAGING_READ_FAILURE", context, cause);
  }
}

export class ReconciliationIntegrityViolation extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "RECONCILIATION_INTEGRITY_VIOLATION", context, cause);
  }
}

export class PartialBatchFailure extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "PARTIAL_BATCH_FAILURE", context, cause);
  }
}

export class HistoryAuditFailure extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "HISTORY_AUDIT_FAILURE", context, cause);
  }
}

// The batch is reconciled; only its staging file is left behind
export class StagingCleanupFailure extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}, cause?: unknown) {
    super(message, "STAGING_CLEANUP_FAILURE", context, cause);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, "CONFIGURATION_ERROR", context);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
