/**
 * @fileoverview Dataset parser that assembles a GraphStore
 *
 * The dataset is line oriented:
 *
 * ```text
 * Movie: Footloose
 * Kevin Bacon
 * John Lithgow
 *
 * Movie: Apollo 13
 * Kevin Bacon
 * ```
 *
 * A line containing `:` starts a movie block; the title is whatever follows
 * the first colon (one separating space dropped). Lines starting with
 * whitespace, and empty lines, are ignored. Every other line names an actor in
 * the current block.
 *
 * @module services/GraphBuilder
 */

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { DEFAULT_CONFIG } from '../constants/defaults.js';
import { GraphStore } from '../entities/GraphStore.js';
import { FileOpenError, MalformedInputError, OutOfMemoryError } from '../errors/graph.js';
import { isSixDegreesError, wrapError } from '../errors/base.js';
import { createModuleLogger, startTimer } from '../utils/logger.js';

const logger = createModuleLogger('GraphBuilder');

export interface GraphBuilderOptions {
  /** Link repeated movie titles into the first movie with that title */
  mergeDuplicateMovies?: boolean;
  /** Store to populate; a fresh one is created when omitted */
  store?: GraphStore;
}

export type DatasetLine =
  | { kind: 'blank' }
  | { kind: 'heading'; title: string }
  | { kind: 'actor'; name: string };

const LINE_TERMINATOR = /\r?\n?$/;
// Only ASCII whitespace separates blocks; a name may start with U+00A0.
const SEPARATOR_START = /^[ \t\n\v\f\r]/;
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Classify one raw dataset line. A trailing `\n`, `\r\n` or lone `\r` is ignored.
 */
export function classifyLine(rawLine: string): DatasetLine {
  const line = rawLine.replace(LINE_TERMINATOR, '');

  if (line.length === 0 || SEPARATOR_START.test(line)) {
    return { kind: 'blank' };
  }

  const marker = line.indexOf(DEFAULT_CONFIG.DATASET.HEADING_MARKER);
  if (marker !== -1) {
    const rest = line.slice(marker + 1);
    return { kind: 'heading', title: rest.startsWith(' ') ? rest.slice(1) : rest };
  }

  return { kind: 'actor', name: line };
}

interface MovieDraft {
  title: string;
  castIds: number[];
  members: Set<number>;
}

/**
 * Incremental builder: feed it lines with `consume`, then call `finish`.
 */
export class GraphBuilder {
  private readonly store: GraphStore;
  private readonly mergeDuplicateMovies: boolean;
  private draft: MovieDraft | null = null;
  private lineNumber = 0;

  constructor(options: GraphBuilderOptions = {}) {
    this.store = options.store ?? new GraphStore();
    this.mergeDuplicateMovies =
      options.mergeDuplicateMovies ?? DEFAULT_CONFIG.DATASET.MERGE_DUPLICATE_MOVIES;
  }

  /**
   * Process the next dataset line.
   *
   * @throws MalformedInputError if an actor line precedes every movie heading
   */
  consume(rawLine: string): void {
    this.lineNumber++;
    const line = classifyLine(
      this.lineNumber === 1 && rawLine.startsWith(BYTE_ORDER_MARK) ? rawLine.slice(1) : rawLine
    );

    switch (line.kind) {
      case 'blank':
        return;
      case 'heading':
        this.flush();
        this.draft = { title: line.title, castIds: [], members: new Set() };
        return;
      case 'actor':
        this.addToCast(line.name);
        return;
    }
  }

  /**
   * Register the movie still in progress, if any, and return the store.
   */
  finish(): GraphStore {
    this.flush();
    logger.debug({ lines: this.lineNumber, ...this.store.getMetrics() }, 'Graph built');
    return this.store;
  }

  private addToCast(name: string): void {
    const draft = this.draft;
    if (!draft) {
      throw new MalformedInputError(
        `Actor "${name}" on line ${this.lineNumber} appears before any movie heading`,
        this.lineNumber,
        { actorName: name }
      );
    }

    const actor = this.store.getOrCreateActor(name);
    if (draft.members.has(actor.id)) {
      logger.trace({ actor: actor.name, movie: draft.title }, 'Actor already in cast, skipping');
      return;
    }

    try {
      draft.members.add(actor.id);
      draft.castIds.push(actor.id);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new OutOfMemoryError('parse', error, { lineNumber: this.lineNumber });
      }
      throw error;
    }
  }

  private flush(): void {
    const draft = this.draft;
    if (!draft) {
      return;
    }
    this.draft = null;

    const existing = this.mergeDuplicateMovies ? this.store.findMovie(draft.title) : undefined;
    const movie = existing ?? this.store.registerMovie(draft.title);
    for (const actorId of draft.castIds) {
      this.store.link(actorId, movie.id);
    }
  }
}

/**
 * Parse an in-memory sequence of dataset lines.
 */
export function parseDataset(lines: Iterable<string>, options: GraphBuilderOptions = {}): GraphStore {
  const builder = new GraphBuilder(options);
  for (const line of lines) {
    builder.consume(line);
  }
  return builder.finish();
}

/**
 * Stream a dataset file into a new graph.
 *
 * @throws FileOpenError if the file cannot be opened or read
 * @throws MalformedInputError if the contents break the line grammar
 */
export async function loadDataset(path: string, options: GraphBuilderOptions = {}): Promise<GraphStore> {
  const endTimer = startTimer(logger, 'loadDataset');

  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new FileOpenError(path, error);
  }

  const builder = new GraphBuilder(options);
  try {
    if ((await handle.stat()).isDirectory()) {
      throw new FileOpenError(path, undefined, { reason: 'is a directory' });
    }
    for await (const line of handle.readLines({ encoding: 'utf8' })) {
      builder.consume(line);
    }
  } catch (error) {
    if (isSixDegreesError(error)) {
      throw wrapError(error, 'dataset', 'load', { path });
    }
    throw new FileOpenError(path, error);
  } finally {
    await handle.close();
  }

  const store = builder.finish();
  endTimer({ path, ...store.getMetrics() });
  return store;
}
