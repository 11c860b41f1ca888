/**
 * Custom Error Classes
 * ====================
 * Every fatal condition raised while resolving an experiment environment is
 * one of these classes, so callers can branch on `code` without parsing
 * messages.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - a value has the right kind but is not acceptable
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code: string = 'VALIDATION_ERROR') {
    super(message, code, context);
  }
}

/**
 * Type mismatch - a value has the wrong kind (e.g. a number where a path was expected)
 */
export class TypeMismatchError extends AppError {
  public readonly observedType: string;

  constructor(message: string, observedType: string, context?: Record<string, unknown>) {
    super(message, 'TYPE_MISMATCH', { observedType, ...context });
    this.observedType = observedType;
  }
}

/**
 * Schema mismatch - two tables that must share columns do not
 */
export class SchemaMismatchError extends ValidationError {
  public readonly expectedColumns: readonly string[];
  public readonly receivedColumns: readonly string[];

  constructor(
    message: string,
    expectedColumns: readonly string[],
    receivedColumns: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(
      message,
      {
        expectedColumnCount: expectedColumns.length,
        receivedColumnCount: receivedColumns.length,
        ...context,
      },
      'SCHEMA_MISMATCH'
    );
    this.expectedColumns = [...expectedColumns];
    this.receivedColumns = [...receivedColumns];
  }
}

/**
 * Not found error - for missing files and other resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, identifier, ...context });
  }
}

/**
 * Parse error - a file exists but its content cannot be decoded
 */
export class ParseError extends AppError {
  constructor(message: string, source?: string, context?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', { source, ...context });
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    configKey?: string,
    context?: Record<string, unknown>,
    code: string = 'CONFIGURATION_ERROR'
  ) {
    super(message, code, { configKey, ...context });
  }
}

/**
 * Two inputs that may only be supplied one at a time were both supplied
 */
export class MutualExclusionError extends ConfigurationError {
  constructor(message: string, configKeys: readonly string[], context?: Record<string, unknown>) {
    super(message, configKeys.join(','), context, 'MUTUAL_EXCLUSION_VIOLATION');
  }
}

/**
 * A required input was supplied in none of its accepted locations
 */
export class MissingRequiredInputError extends ConfigurationError {
  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, configKey, context, 'MISSING_REQUIRED_INPUT');
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
