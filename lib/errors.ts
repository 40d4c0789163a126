import type { ZodError } from "zod";

/**
 * Base error class that all other mapper errors extend
 */
export abstract class MapperError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a value, a field name or a filter does not satisfy the schema
 */
export class ValidationError extends MapperError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly rule: string,
    public readonly modelName?: string,
  ) {
    const modelPrefix = modelName ? `${modelName}: ` : "";
    super(
      `${modelPrefix}Validation failed for field '${field}': ${rule}`,
      {
        field,
        value,
        rule,
        modelName,
      },
    );
  }

  /**
   * Re-create this error with the field and model it was raised for
   */
  inContext(field: string, modelName?: string): ValidationError {
    return new ValidationError(
      field,
      this.value,
      this.rule,
      modelName ?? this.modelName,
    );
  }
}

/**
 * Thrown when a required record is not found
 */
export class NotFoundError extends MapperError {
  readonly code = "NOT_FOUND_ERROR";

  constructor(
    public readonly modelName: string,
    public readonly identifier: number | string | Record<string, unknown>,
  ) {
    const identifierStr = typeof identifier === "object"
      ? JSON.stringify(identifier)
      : String(identifier);

    super(`${modelName} not found: ${identifierStr}`, {
      modelName,
      identifier,
    });
  }
}

/**
 * Thrown when an operation fails due to store issues
 */
export class OperationError extends MapperError {
  readonly code = "OPERATION_ERROR";

  constructor(
    public readonly operation:
      | "create"
      | "read"
      | "update"
      | "delete"
      | "allocate"
      | "connect",
    message: string,
    public readonly modelName?: string,
    public readonly originalError?: Error,
  ) {
    const modelPrefix = modelName ? `${modelName}: ` : "";
    super(
      `${modelPrefix}${operation} operation failed: ${message}`,
      {
        operation,
        modelName,
        originalError: originalError?.message,
      },
    );

    // Preserve the original error's stack if available
    if (originalError?.stack) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Thrown when there's a configuration or setup issue
 */
export class ConfigurationError extends MapperError {
  readonly code = "CONFIGURATION_ERROR";

  constructor(
    message: string,
    public readonly configPath?: string,
  ) {
    super(
      `Configuration error${configPath ? ` in ${configPath}` : ""}: ${message}`,
      {
        configPath,
      },
    );
  }
}

/**
 * Utility functions for error handling
 */
export class MapperErrorUtils {
  static isMapperError(error: unknown): error is MapperError {
    return error instanceof MapperError;
  }

  static isValidationError(error: unknown): error is ValidationError {
    return error instanceof ValidationError;
  }

  static isNotFoundError(error: unknown): error is NotFoundError {
    return error instanceof NotFoundError;
  }

  static isOperationError(error: unknown): error is OperationError {
    return error instanceof OperationError;
  }

  static isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError;
  }

  /**
   * Wrap a foreign error in an OperationError; mapper errors pass through
   */
  static wrap(
    error: unknown,
    operation: OperationError["operation"],
    modelName?: string,
  ): MapperError {
    if (MapperErrorUtils.isMapperError(error)) {
      return error;
    }
    if (error instanceof Error) {
      return new OperationError(operation, error.message, modelName, error);
    }
    return new OperationError(operation, String(error), modelName);
  }

  /**
   * Create a validation error from the first issue of a Zod error
   */
  static fromZodError(
    zodError: ZodError,
    field: string,
    value: unknown,
    modelName?: string,
  ): ValidationError {
    const firstIssue = zodError.issues[0];
    if (!firstIssue) {
      return new ValidationError(field, value, "validation failed", modelName);
    }
    const path = firstIssue.path.join(".");
    const rule = path ? `${path}: ${firstIssue.message}` : firstIssue.message;
    return new ValidationError(field, value, rule, modelName);
  }

  /**
   * Extract user-friendly error message
   */
  static getUserMessage(error: unknown): string {
    if (MapperErrorUtils.isMapperError(error)) {
      return error.message;
    }

    return "An unexpected error occurred";
  }
}
