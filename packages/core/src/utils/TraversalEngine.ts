/**
 * @fileoverview Breadth-first search over the actor co-appearance graph
 *
 * Two actors are adjacent when they share a movie. Adjacency is never
 * materialised: each step walks the actor's movies and then each movie's cast,
 * both in insertion order, so a given store always yields the same result.
 *
 * Visit state lives in arrays owned by a single call, so the engine can be
 * shared between queries and the store is only ever read.
 *
 * @module utils/TraversalEngine
 */

import type { GraphStore } from '../entities/GraphStore.js';
import { GraphIntegrityError } from '../errors/graph.js';
import type { ActorRecord, MovieRecord } from '../schemas/graph.js';
import { Queue } from './Queue.js';

const UNVISITED = -1;

/**
 * One step of a separation path: `from` and `to` both appear in `movie`.
 */
export interface SeparationHop {
  from: ActorRecord;
  movie: MovieRecord;
  to: ActorRecord;
}

/**
 * Shortest chain of shared movies from `source` to `target`.
 * `distance` always equals `hops.length`.
 */
export interface SeparationPath {
  source: ActorRecord;
  target: ActorRecord;
  distance: number;
  hops: SeparationHop[];
}

interface Predecessors {
  actor: Int32Array;
  movie: Int32Array;
}

interface SearchHit {
  distance: number;
  predecessors?: Predecessors | undefined;
}

export class TraversalEngine {
  constructor(private readonly store: GraphStore) {}

  /**
   * Number of shared-movie hops between two actors.
   *
   * @returns the distance, or null when no chain of movies connects them
   */
  shortestDistance(source: ActorRecord, target: ActorRecord): number | null {
    this.assertOwned(source);
    this.assertOwned(target);

    if (source === target) {
      return 0;
    }

    return this.search(source, target, false)?.distance ?? null;
  }

  /**
   * Like `shortestDistance`, but also records which actor and movie each
   * actor was discovered through, and backtracks from the target to list
   * the hops.
   */
  findShortestPath(source: ActorRecord, target: ActorRecord): SeparationPath | null {
    this.assertOwned(source);
    this.assertOwned(target);

    if (source === target) {
      return { source, target, distance: 0, hops: [] };
    }

    const hit = this.search(source, target, true);
    if (!hit?.predecessors) {
      return null;
    }

    const hops: SeparationHop[] = [];
    let current = target;
    while (current !== source) {
      const from = this.store.getActor(hit.predecessors.actor[current.id] ?? UNVISITED);
      const movie = this.store.getMovie(hit.predecessors.movie[current.id] ?? UNVISITED);
      if (!from || !movie) {
        throw new GraphIntegrityError('Broken predecessor chain', 'findShortestPath', {
          actorId: current.id,
        });
      }
      hops.unshift({ from, movie, to: current });
      current = from;
    }

    return { source, target, distance: hops.length, hops };
  }

  private search(source: ActorRecord, target: ActorRecord, trackPath: boolean): SearchHit | null {
    const actorCount = this.store.actorCount;
    const levels = new Int32Array(actorCount).fill(UNVISITED);
    const predecessors: Predecessors | undefined = trackPath
      ? {
          actor: new Int32Array(actorCount).fill(UNVISITED),
          movie: new Int32Array(actorCount).fill(UNVISITED),
        }
      : undefined;

    levels[source.id] = 0;
    const queue = new Queue<ActorRecord>([source]);

    for (let actor = queue.dequeue(); actor !== undefined; actor = queue.dequeue()) {
      const nextLevel = (levels[actor.id] ?? UNVISITED) + 1;

      for (const movieId of actor.movieIds) {
        const movie = this.store.getMovie(movieId);
        if (!movie) continue;

        for (const castId of movie.castIds) {
          if (levels[castId] !== UNVISITED) continue;

          levels[castId] = nextLevel;
          if (predecessors) {
            predecessors.actor[castId] = actor.id;
            predecessors.movie[castId] = movieId;
          }

          if (castId === target.id) {
            return { distance: nextLevel, predecessors };
          }

          const castMember = this.store.getActor(castId);
          if (castMember) {
            queue.enqueue(castMember);
          }
        }
      }
    }

    return null;
  }

  private assertOwned(actor: ActorRecord): void {
    if (this.store.getActor(actor.id) !== actor) {
      throw new GraphIntegrityError(`Actor "${actor.name}" does not belong to this graph`, 'traverse', {
        actorId: actor.id,
      });
    }
  }
}
