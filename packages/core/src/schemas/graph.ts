/**
 * @fileoverview Movie/cast graph schemas and types
 *
 * Records are addressed by stable integer ids handed out in insertion order,
 * so the store can be walked with plain array indexing.
 *
 * @module schemas/graph
 */

import { z } from 'zod';

/**
 * Actor names are case-sensitive; only trailing whitespace is insignificant.
 */
export const actorName = z
  .string()
  .transform((name) => name.trimEnd())
  .pipe(z.string().min(1, 'Actor name must not be empty'));

/**
 * Schema for the serialisable form of a graph: every movie, in registration
 * order, with its cast in link order.
 */
export const graphDataSchema = z.object({
  movies: z.array(
    z.object({
      name: z.string(),
      cast: z.array(actorName),
    })
  ),
});

export type GraphData = z.infer<typeof graphDataSchema>;

/**
 * An actor node. `movieIds` lists the movies the actor appears in.
 */
export interface ActorRecord {
  readonly id: number;
  readonly name: string;
  readonly movieIds: readonly number[];
}

/**
 * A movie. `castIds` lists its actors; two actors sharing a movie are adjacent.
 */
export interface MovieRecord {
  readonly id: number;
  readonly name: string;
  readonly castIds: readonly number[];
}

/**
 * Metrics about the graph structure
 */
export interface GraphMetrics {
  /** Number of distinct actors */
  actors: number;
  /** Number of movie records (repeated titles count separately unless merged) */
  movies: number;
  /** Number of actor–movie memberships */
  links: number;
  /** Size of the largest cast */
  largestCast: number;
}
