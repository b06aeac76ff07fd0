/**
 * Error classes shared by the generators, the CLI and the MCP server.
 * Entry points catch ErdbError at the top level, log it and exit non-zero.
 */

export interface ErrorDetails {
  field?: string;
  value?: unknown;
  constraint?: string;
  [key: string]: unknown;
}

export class ErdbError extends Error {
  constructor(
    message: string,
    public readonly code: string = "ERDB_ERROR",
    public readonly details?: ErrorDetails | ErrorDetails[],
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ConfigError extends ErdbError {
  constructor(message: string, details?: ErrorDetails | ErrorDetails[]) {
    super(message, "CONFIG_ERROR", details);
  }
}

/**
 * Malformed command line input
 */
export class ArgumentError extends ErdbError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "ARGUMENT_ERROR", details);
  }
}

export class NotFoundError extends ErdbError {
  constructor(resource: string, identifier?: string | number) {
    const message = identifier !== undefined
      ? `${resource} '${identifier}' not found`
      : `${resource} not found`;
    super(message, "NOT_FOUND", { resource, identifier });
  }
}

/**
 * A param field holds a value its accessor cannot read
 */
export class ParamFieldError extends ErdbError {
  constructor(stem: string, id: number, field: string, value: string) {
    super(`${stem}[${id}].${field} is not numeric: '${value}'`, "PARAM_FIELD_ERROR", { field, value, stem, id });
  }
}

export class SchemaError extends ErdbError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "SCHEMA_ERROR", details);
  }
}

export class SchemaValidationError extends ErdbError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "SCHEMA_VALIDATION_FAILED", details);
  }
}

export class OutputDocumentError extends ErdbError {
  constructor(filePath: string, reason: string) {
    super(`Output file ${filePath} is unusable: ${reason}`, "OUTPUT_DOCUMENT_ERROR", { filePath });
  }
}
