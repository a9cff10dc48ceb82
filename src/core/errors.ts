/**
 * @fileoverview Praxis error hierarchy
 *
 * Typed, structured errors for the verification engine. Evidence misses are
 * returned as values (see evidence_store.ts); everything thrown from here on
 * is an anomaly the operator has to fix.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PraxisError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// EVIDENCE LOOKUP MISSES
// ============================================================================

export class EvidenceNotFoundError extends PraxisError {
  readonly code = 'EVIDENCE_NOT_FOUND';
  readonly retryable = false;

  constructor(
    readonly sourceId: string,
    readonly key: string,
  ) {
    super(`No row with account=${key} in ${sourceId}`);
    this.name = 'EvidenceNotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        sourceId: this.sourceId,
        key: this.key,
      },
    };
  }
}

export class NoNumericFieldError extends PraxisError {
  readonly code = 'NO_NUMERIC_FIELD';
  readonly retryable = false;

  constructor(
    readonly sourceId: string,
    readonly key: string,
    readonly columns: readonly string[],
  ) {
    super(`Row account=${key} in ${sourceId} has no numeric column (checked: ${columns.join(', ') || 'none'})`);
    this.name = 'NoNumericFieldError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        sourceId: this.sourceId,
        key: this.key,
        columns: [...this.columns],
      },
    };
  }
}

export type EvidenceMiss = EvidenceNotFoundError | NoNumericFieldError;

// ============================================================================
// DATASET ERRORS
// ============================================================================

export class DatasetError extends PraxisError {
  readonly code = 'DATASET_ERROR';
  readonly retryable = false;

  constructor(
    readonly path: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DatasetError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        path: this.path,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

export class ParseError extends PraxisError {
  readonly code = 'PARSE_ERROR';
  readonly retryable = false;

  constructor(
    readonly format: string,
    message: string,
    readonly source?: string,
    readonly line?: number,
  ) {
    super(`Failed to parse ${format}${source ? ` (${source})` : ''}: ${message}`);
    this.name = 'ParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        format: this.format,
        source: this.source,
        line: this.line,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends PraxisError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends PraxisError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ARTIFACT ERRORS
// ============================================================================

export class ArtifactWriteError extends PraxisError {
  readonly code = 'ARTIFACT_WRITE_ERROR';
  readonly retryable = true;

  constructor(
    readonly path: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Run artifact write failed for ${path}: ${message}`);
    this.name = 'ArtifactWriteError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        path: this.path,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// EXECUTION ERRORS
// ============================================================================

export type ExecutionFailureReason = 'timeout' | 'non_zero_exit' | 'invalid_output' | 'spawn_failed';

export class ExecutionError extends PraxisError {
  readonly code = 'EXECUTION_ERROR';

  constructor(
    readonly reason: ExecutionFailureReason,
    message: string,
    readonly retryable: boolean = false,
  ) {
    super(`Execution failed (${reason}): ${message}`);
    this.name = 'ExecutionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isPraxisError(error: unknown): error is PraxisError {
  return error instanceof PraxisError;
}

export function isEvidenceMiss(error: unknown): error is EvidenceMiss {
  return error instanceof EvidenceNotFoundError || error instanceof NoNumericFieldError;
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError;
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  notFound: (sourceId: string, key: string) =>
    new EvidenceNotFoundError(sourceId, key),

  noNumericField: (sourceId: string, key: string, columns: readonly string[]) =>
    new NoNumericFieldError(sourceId, key, columns),

  dataset: (path: string, message: string, cause?: Error) =>
    new DatasetError(path, message, cause),

  parse: (format: string, message: string, source?: string, line?: number) =>
    new ParseError(format, message, source, line),

  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),

  artifactWrite: (path: string, message: string, cause?: Error) =>
    new ArtifactWriteError(path, message, cause),

  execution: (reason: ExecutionFailureReason, message: string, retryable = false) =>
    new ExecutionError(reason, message, retryable),
};
