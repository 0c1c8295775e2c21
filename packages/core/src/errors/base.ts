/**
 * Base error classes for SixDegrees
 *
 * Every error raised by the core and the CLI derives from SixDegreesError so
 * callers can tell fatal build-phase failures from per-query ones.
 */

/**
 * Base error class for all SixDegrees errors
 * Provides consistent structure and context handling
 */
export abstract class SixDegreesError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  /**
   * Timestamp when error occurred
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Copy of this error with additional context merged in.
   * Subclass fields, message and stack are carried over unchanged.
   */
  withContext(additionalContext: Record<string, unknown>): this {
    return Object.create(Object.getPrototypeOf(this), {
      ...Object.getOwnPropertyDescriptors(this),
      context: {
        value: { ...this.context, ...additionalContext },
        enumerable: true,
        writable: false,
        configurable: true,
      },
    });
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Turn anything thrown into a SixDegreesError. Our own errors keep their
 * class and gain `context`; anything else keeps its original as `cause`.
 */
export function wrapError(
  error: unknown,
  module: string,
  operation: string,
  context?: Record<string, unknown>
): SixDegreesError {
  if (error instanceof SixDegreesError) {
    return context ? error.withContext(context) : error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new UnexpectedError(message, module, operation, { ...context, cause });
}

/** Stand-in for errors raised outside this codebase */
class UnexpectedError extends SixDegreesError {}

/**
 * Type guard to check if an error is a SixDegreesError
 */
export function isSixDegreesError(error: unknown): error is SixDegreesError {
  return error instanceof SixDegreesError;
}
