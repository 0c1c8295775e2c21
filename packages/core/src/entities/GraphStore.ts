/**
 * @fileoverview In-memory store of actors, movies and their memberships
 *
 * Actors and movies live in two arenas indexed by stable integer ids. Each
 * membership is recorded on both sides (actor → movies, movie → cast), and
 * `link` is the only way to add one, so the two sides never disagree.
 *
 * @module entities/GraphStore
 */

import { GraphIntegrityError, OutOfMemoryError } from '../errors/graph.js';
import type { ActorRecord, GraphData, GraphMetrics, MovieRecord } from '../schemas/graph.js';
import { graphDataSchema } from '../schemas/graph.js';

interface ActorNode {
  readonly id: number;
  readonly name: string;
  readonly movieIds: number[];
}

interface MovieNode {
  readonly id: number;
  readonly name: string;
  readonly castIds: number[];
  /** Membership index for the idempotent link check */
  readonly members: Set<number>;
}

/**
 * Canonical form of an actor name: trailing whitespace is not significant.
 */
export function normalizeActorName(name: string): string {
  return name.trimEnd();
}

/**
 * Grows-only registry of actors and movies.
 *
 * Iteration order is insertion order for every collection the store hands
 * out, which makes traversals over it deterministic.
 */
export class GraphStore {
  private readonly _actors: ActorNode[] = [];
  private readonly _movies: MovieNode[] = [];
  private readonly _actorIdsByName = new Map<string, number>();
  private readonly _movieIdsByName = new Map<string, number>();
  private _links = 0;

  /**
   * Build a store from its serialisable form. Input is validated with Zod.
   */
  static fromPlainObject(data: GraphData): GraphStore {
    const parsed = graphDataSchema.parse(data);
    const store = new GraphStore();

    for (const entry of parsed.movies) {
      const movie = store.registerMovie(entry.name);
      for (const name of entry.cast) {
        store.link(store.getOrCreateActor(name).id, movie.id);
      }
    }

    return store;
  }

  // ---------------------------------------------------------------------------
  // Actors
  // ---------------------------------------------------------------------------

  findActor(name: string): ActorRecord | undefined {
    const id = this._actorIdsByName.get(normalizeActorName(name));
    return id === undefined ? undefined : this._actors[id];
  }

  getOrCreateActor(name: string): ActorRecord {
    return this.findActor(name) ?? this.registerActor(name);
  }

  /**
   * Register a new actor with no movies.
   *
   * @throws GraphIntegrityError if the name is empty or already registered
   */
  registerActor(name: string): ActorRecord {
    const normalized = normalizeActorName(name);
    if (normalized.length === 0) {
      throw new GraphIntegrityError('Actor name must not be empty', 'registerActor');
    }
    if (this._actorIdsByName.has(normalized)) {
      throw new GraphIntegrityError(`Actor "${normalized}" is already registered`, 'registerActor', {
        actorName: normalized,
      });
    }

    const actor: ActorNode = { id: this._actors.length, name: normalized, movieIds: [] };
    guardAllocation('registerActor', () => {
      this._actors.push(actor);
      this._actorIdsByName.set(normalized, actor.id);
    });
    return actor;
  }

  getActor(id: number): ActorRecord | undefined {
    return this._actors[id];
  }

  actors(): readonly ActorRecord[] {
    return this._actors;
  }

  get actorCount(): number {
    return this._actors.length;
  }

  // ---------------------------------------------------------------------------
  // Movies
  // ---------------------------------------------------------------------------

  /**
   * Register a new movie with an empty cast. Titles are not required to be
   * unique; `findMovie` returns the first movie registered under a title.
   */
  registerMovie(name: string): MovieRecord {
    const movie: MovieNode = {
      id: this._movies.length,
      name,
      castIds: [],
      members: new Set(),
    };
    guardAllocation('registerMovie', () => {
      this._movies.push(movie);
      if (!this._movieIdsByName.has(name)) {
        this._movieIdsByName.set(name, movie.id);
      }
    });
    return movie;
  }

  findMovie(name: string): MovieRecord | undefined {
    const id = this._movieIdsByName.get(name);
    return id === undefined ? undefined : this._movies[id];
  }

  getMovie(id: number): MovieRecord | undefined {
    return this._movies[id];
  }

  movies(): readonly MovieRecord[] {
    return this._movies;
  }

  get movieCount(): number {
    return this._movies.length;
  }

  // ---------------------------------------------------------------------------
  // Memberships
  // ---------------------------------------------------------------------------

  /**
   * Record that an actor appears in a movie, on both sides.
   *
   * @returns false when the pair was already linked (nothing changes)
   * @throws GraphIntegrityError if either id is unknown
   */
  link(actorId: number, movieId: number): boolean {
    const actor = this._actors[actorId];
    const movie = this._movies[movieId];
    if (!actor || !movie) {
      throw new GraphIntegrityError('Cannot link unknown actor or movie', 'link', {
        actorId,
        movieId,
      });
    }

    if (movie.members.has(actorId)) {
      return false;
    }

    const castLength = movie.castIds.length;
    guardAllocation(
      'link',
      () => {
        movie.members.add(actorId);
        movie.castIds.push(actorId);
        actor.movieIds.push(movieId);
      },
      () => {
        movie.members.delete(actorId);
        movie.castIds.length = castLength;
      }
    );
    this._links++;
    return true;
  }

  isLinked(actorId: number, movieId: number): boolean {
    return this._movies[movieId]?.members.has(actorId) ?? false;
  }

  // ---------------------------------------------------------------------------
  // Metrics and Serialization
  // ---------------------------------------------------------------------------

  getMetrics(): GraphMetrics {
    let largestCast = 0;
    for (const movie of this._movies) {
      largestCast = Math.max(largestCast, movie.castIds.length);
    }

    return {
      actors: this._actors.length,
      movies: this._movies.length,
      links: this._links,
      largestCast,
    };
  }

  /**
   * Every movie with its cast names, in registration and link order.
   */
  toPlainObject(): GraphData {
    return {
      movies: this._movies.map((movie) => ({
        name: movie.name,
        cast: movie.castIds.map((id) => this._actors[id]?.name ?? ''),
      })),
    };
  }
}

/**
 * The runtime reports exhausted collection capacity as a RangeError.
 * `undo` runs before any error leaves, so a failed write leaves nothing behind.
 */
function guardAllocation(operation: string, write: () => void, undo?: () => void): void {
  try {
    write();
  } catch (error) {
    undo?.();
    if (error instanceof RangeError) {
      throw new OutOfMemoryError(operation, error);
    }
    throw error;
  }
}
