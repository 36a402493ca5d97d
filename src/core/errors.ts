/**
 * Domain-specific error types for the centering engine.
 *
 * Centering outcomes (indeterminate or duplicate axes, an already centered
 * target) are reported as warnings on the result. These classes cover the
 * failures that do abort an operation.
 */

/**
 * Base error class for all centering engine errors.
 */
export class CenteringEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CenteringEngineError";
  }
}

/**
 * Error thrown when input validation fails.
 * Contains an array of all validation errors found.
 */
export class ValidationError extends CenteringEngineError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join("; ")}`);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * Error thrown when the host application fails while applying a move.
 */
export class HostOperationError extends CenteringEngineError {
  readonly operation: "move_feature" | "occurrence_transform";

  constructor(
    message: string,
    operation: HostOperationError["operation"],
    cause?: unknown
  ) {
    super(message);
    this.name = "HostOperationError";
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Error thrown when a command session is used after the host destroyed it.
 */
export class CommandSessionError extends CenteringEngineError {
  readonly commandName: string;

  constructor(message: string, commandName: string) {
    super(message);
    this.name = "CommandSessionError";
    this.commandName = commandName;
  }
}
