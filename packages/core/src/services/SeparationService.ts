/**
 * @fileoverview SeparationService answers Bacon Number queries
 *
 * Each query resolves an actor by name and measures it against the reference
 * actor with the TraversalEngine. A name that is not in the graph is reported
 * and counted, but never stops the caller from asking the next one.
 *
 * @module services/SeparationService
 */

import type { GraphStore } from '../entities/GraphStore.js';
import { ActorNotFoundError } from '../errors/service.js';
import type { ActorRecord } from '../schemas/graph.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import { type SeparationPath, TraversalEngine } from '../utils/TraversalEngine.js';

const logger = createModuleLogger('SeparationService');

export interface SeparationServiceOptions {
  /** Name every score is measured against */
  referenceActor?: string;
}

export interface ScoreOptions {
  /** Also reconstruct the chain of movies (the `-l` flag) */
  includePath?: boolean;
}

export type ScoreOutcome =
  | {
      kind: 'scored';
      actor: ActorRecord;
      distance: number;
      path?: SeparationPath | undefined;
    }
  | {
      kind: 'unreachable';
      actor: ActorRecord;
      reason: 'no-path' | 'no-reference';
    }
  | {
      kind: 'not-found';
      name: string;
      error: ActorNotFoundError;
    };

export class SeparationService {
  private readonly engine: TraversalEngine;
  private readonly referenceActor: string;
  private notFound = 0;

  constructor(
    private readonly store: GraphStore,
    options: SeparationServiceOptions = {}
  ) {
    this.engine = new TraversalEngine(store);
    this.referenceActor = options.referenceActor ?? cfg.REFERENCE_ACTOR;
  }

  /**
   * Score one queried name against the reference actor.
   */
  score(name: string, options: ScoreOptions = {}): ScoreOutcome {
    const actor = this.store.findActor(name);
    if (!actor) {
      this.notFound++;
      const error = new ActorNotFoundError(name, 'score');
      logger.warn({ actorName: name }, error.message);
      return { kind: 'not-found', name, error };
    }

    const reference = this.store.findActor(this.referenceActor);
    if (!reference) {
      logger.debug({ referenceActor: this.referenceActor }, 'Reference actor is not in the graph');
      return { kind: 'unreachable', actor, reason: 'no-reference' };
    }

    if (options.includePath) {
      const path = this.engine.findShortestPath(reference, actor);
      return path
        ? { kind: 'scored', actor, distance: path.distance, path }
        : { kind: 'unreachable', actor, reason: 'no-path' };
    }

    const distance = this.engine.shortestDistance(reference, actor);
    return distance === null
      ? { kind: 'unreachable', actor, reason: 'no-path' }
      : { kind: 'scored', actor, distance };
  }

  /**
   * Score a batch of names in order.
   */
  scoreAll(names: Iterable<string>, options: ScoreOptions = {}): ScoreOutcome[] {
    const outcomes: ScoreOutcome[] = [];
    for (const name of names) {
      outcomes.push(this.score(name, options));
    }
    return outcomes;
  }

  /** Number of queried names that matched no actor so far */
  get notFoundCount(): number {
    return this.notFound;
  }

  /** 0 while every query resolved an actor, 1 afterwards */
  get exitCode(): 0 | 1 {
    return this.notFound > 0 ? 1 : 0;
  }
}
