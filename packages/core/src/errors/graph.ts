/**
 * Build-phase error classes
 *
 * Raised while opening, parsing or assembling a dataset. All of them are
 * fatal: a graph that failed to build is never queried.
 */

import { SixDegreesError } from './base.js';

/**
 * Error thrown when the dataset file cannot be opened or read
 */
export class FileOpenError extends SixDegreesError {
  constructor(
    public readonly path: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(`Could not open the file: ${path}`, 'dataset', 'open', { ...context, path, cause });
  }
}

/**
 * Error thrown when an actor line appears before any movie heading
 */
export class MalformedInputError extends SixDegreesError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'dataset', 'parse', { ...context, lineNumber });
  }
}

/**
 * Error thrown when the runtime refuses to grow the graph any further
 */
export class OutOfMemoryError extends SixDegreesError {
  constructor(operation: string, cause?: unknown, context?: Record<string, unknown>) {
    super('Not enough memory to build the graph', 'graph', operation, { ...context, cause });
  }
}

/**
 * Error thrown when a store operation would break an identity or link invariant
 */
export class GraphIntegrityError extends SixDegreesError {
  constructor(message: string, operation: string, context?: Record<string, unknown>) {
    super(message, 'graph', operation, context);
  }
}
