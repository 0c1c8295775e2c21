/**
 * @fileoverview Tests for GraphStore
 *
 * Covers actor identity, insertion order and the bidirectional link invariant.
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { GraphStore, normalizeActorName } from '../src/entities/GraphStore.js';
import { GraphIntegrityError, OutOfMemoryError } from '../src/errors/graph.js';

describe('GraphStore', () => {
  describe('Actors', () => {
    it('assigns sequential ids in insertion order', () => {
      const store = new GraphStore();
      const bacon = store.registerActor('Kevin Bacon');
      const lithgow = store.registerActor('John Lithgow');

      expect(bacon.id).toBe(0);
      expect(lithgow.id).toBe(1);
      expect(store.actors().map((actor) => actor.name)).toEqual(['Kevin Bacon', 'John Lithgow']);
      expect(store.actorCount).toBe(2);
    });

    it('finds actors by exact, case-sensitive name', () => {
      const store = new GraphStore();
      const bacon = store.registerActor('Kevin Bacon');

      expect(store.findActor('Kevin Bacon')).toBe(bacon);
      expect(store.findActor('kevin bacon')).toBeUndefined();
      expect(store.findActor('Kevin')).toBeUndefined();
    });

    it('ignores trailing whitespace in names', () => {
      const store = new GraphStore();
      const bacon = store.registerActor('Kevin Bacon  ');

      expect(bacon.name).toBe('Kevin Bacon');
      expect(store.findActor('Kevin Bacon\r')).toBe(bacon);
      expect(normalizeActorName(' Kevin Bacon \t')).toBe(' Kevin Bacon');
    });

    it('returns the existing record from getOrCreateActor', () => {
      const store = new GraphStore();
      const first = store.getOrCreateActor('Kevin Bacon');
      const second = store.getOrCreateActor('Kevin Bacon');

      expect(second).toBe(first);
      expect(store.actorCount).toBe(1);
    });

    it('rejects duplicate and empty actor names', () => {
      const store = new GraphStore();
      store.registerActor('Kevin Bacon');

      expect(() => store.registerActor('Kevin Bacon')).toThrow(GraphIntegrityError);
      expect(() => store.registerActor('   ')).toThrow('Actor name must not be empty');
    });
  });

  describe('Movies', () => {
    it('keeps repeated titles as separate records', () => {
      const store = new GraphStore();
      const first = store.registerMovie('Footloose');
      const second = store.registerMovie('Footloose');

      expect(second.id).not.toBe(first.id);
      expect(store.movieCount).toBe(2);
      expect(store.findMovie('Footloose')).toBe(first);
      expect(store.findMovie('Apollo 13')).toBeUndefined();
    });
  });

  describe('Links', () => {
    it('records a membership on both sides', () => {
      const store = new GraphStore();
      const actor = store.registerActor('Kevin Bacon');
      const movie = store.registerMovie('Footloose');

      expect(store.link(actor.id, movie.id)).toBe(true);
      expect(store.getActor(actor.id)?.movieIds).toEqual([movie.id]);
      expect(store.getMovie(movie.id)?.castIds).toEqual([actor.id]);
      expect(store.isLinked(actor.id, movie.id)).toBe(true);
    });

    it('treats re-linking the same pair as a no-op', () => {
      const store = new GraphStore();
      const actor = store.registerActor('Kevin Bacon');
      const movie = store.registerMovie('Footloose');

      store.link(actor.id, movie.id);
      expect(store.link(actor.id, movie.id)).toBe(false);

      expect(actor.movieIds).toEqual([movie.id]);
      expect(movie.castIds).toEqual([actor.id]);
      expect(store.getMetrics().links).toBe(1);
    });

    it('refuses to link unknown ids', () => {
      const store = new GraphStore();
      const actor = store.registerActor('Kevin Bacon');

      expect(() => store.link(actor.id, 7)).toThrow(GraphIntegrityError);
      expect(store.isLinked(actor.id, 7)).toBe(false);
    });

    it('leaves neither side written when the actor side cannot grow', () => {
      const store = new GraphStore();
      const actor = store.registerActor('Kevin Bacon');
      const movie = store.registerMovie('Footloose');
      Object.defineProperty(actor.movieIds, 'push', {
        value: () => {
          throw new RangeError('Invalid array length');
        },
      });

      expect(() => store.link(actor.id, movie.id)).toThrow(OutOfMemoryError);
      expect(store.isLinked(actor.id, movie.id)).toBe(false);
      expect(store.getMovie(movie.id)?.castIds).toEqual([]);
      expect(actor.movieIds).toEqual([]);
      expect(store.getMetrics().links).toBe(0);
    });
  });

  describe('Metrics and Serialization', () => {
    it('reports counts and the largest cast', () => {
      const store = GraphStore.fromPlainObject({
        movies: [
          { name: 'Footloose', cast: ['Kevin Bacon', 'John Lithgow', 'Lori Singer'] },
          { name: 'Apollo 13', cast: ['Kevin Bacon', 'Tom Hanks'] },
        ],
      });

      expect(store.getMetrics()).toEqual({ actors: 4, movies: 2, links: 5, largestCast: 3 });
    });

    it('serialises movies with their casts in order', () => {
      const data = {
        movies: [
          { name: 'Footloose', cast: ['Kevin Bacon', 'John Lithgow'] },
          { name: 'Harry and the Hendersons', cast: ['John Lithgow'] },
          { name: 'Empty', cast: [] },
        ],
      };

      expect(GraphStore.fromPlainObject(data).toPlainObject()).toEqual(data);
    });

    it('validates plain objects with Zod', () => {
      expect(() =>
        GraphStore.fromPlainObject({ movies: [{ name: 'Footloose', cast: ['  '] }] })
      ).toThrow(ZodError);
    });
  });
});
