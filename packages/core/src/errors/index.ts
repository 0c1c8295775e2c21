/**
 * Centralized error handling for SixDegrees
 *
 * This module exports all error classes and utilities for consistent
 * error handling across the application.
 */

// Base error classes and utilities
export {
  SixDegreesError,
  wrapError,
  isSixDegreesError,
} from './base.js';

// Build-phase errors
export {
  FileOpenError,
  MalformedInputError,
  OutOfMemoryError,
  GraphIntegrityError,
} from './graph.js';

// Service errors
export { ServiceError, ActorNotFoundError } from './service.js';

// Command-line errors
export { CliUsageError } from './cli.js';
