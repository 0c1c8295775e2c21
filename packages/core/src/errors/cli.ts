import { SixDegreesError } from './base.js';

/**
 * Error thrown when the command line cannot be accepted as given
 */
export class CliUsageError extends SixDegreesError {
  constructor(message: string, public readonly argv: readonly string[]) {
    super(message, 'cli', 'parseArguments', { argv });
  }
}
