/**
 * Service-specific error classes
 *
 * Errors raised while answering queries against a built graph
 */

import { SixDegreesError } from './base.js';

/**
 * Base class for service-related errors
 */
export abstract class ServiceError extends SixDegreesError {
  constructor(
    message: string,
    service: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `service.${service}`, operation, context);
  }
}

/**
 * Error reported when a queried actor is not in the graph.
 * Recoverable: the query loop moves on to the next name.
 */
export class ActorNotFoundError extends ServiceError {
  constructor(
    public readonly actorName: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Actor Could Not be Found: ${actorName}`, 'separation', operation, {
      ...context,
      actorName,
    });
  }
}
