/**
 * Standard error classes for Seedbed
 *
 * Validation violations are report data and never surface as errors.
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  SCHEMA_NOT_FOUND = "SCHEMA_NOT_FOUND",
  SCHEMA_DEFINITION_ERROR = "SCHEMA_DEFINITION_ERROR",
  GENERATION_ERROR = "GENERATION_ERROR",
  PERSISTENCE_ERROR = "PERSISTENCE_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class SeedbedError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SeedbedError";
  }

  /**
   * Convert error to a plain response object
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class SchemaNotFoundError extends SeedbedError {
  constructor(
    public readonly schemaName: string,
    details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.SCHEMA_NOT_FOUND,
      `Schema not found: ${schemaName}`,
      details,
      options,
    );
    this.name = "SchemaNotFoundError";
  }
}

export class SchemaDefinitionError extends SeedbedError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_DEFINITION_ERROR, message, details, options);
    this.name = "SchemaDefinitionError";
  }
}

export class GenerationError extends SeedbedError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.GENERATION_ERROR, message, details, options);
    this.name = "GenerationError";
  }
}

export class PersistenceError extends SeedbedError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.PERSISTENCE_ERROR, message, details, options);
    this.name = "PersistenceError";
  }
}

export class ConfigError extends SeedbedError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

/**
 * Wrap an unknown thrown value as a SeedbedError, keeping known subclasses
 */
export function toSeedbedError(error: unknown): SeedbedError {
  if (error instanceof SeedbedError) return error;
  return new SeedbedError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
