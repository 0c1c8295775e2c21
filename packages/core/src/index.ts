/**
 * SixDegrees Core - Bacon Numbers over a movie/cast graph
 *
 * Build a graph once with `loadDataset` or `parseDataset`, then answer
 * queries with `SeparationService` (or the lower-level `TraversalEngine`).
 */

// Graph store
export { GraphStore, normalizeActorName } from './entities/GraphStore.js';

// Dataset parsing
export {
  GraphBuilder,
  classifyLine,
  loadDataset,
  parseDataset,
  type DatasetLine,
  type GraphBuilderOptions,
} from './services/GraphBuilder.js';

// Queries
export {
  SeparationService,
  type ScoreOptions,
  type ScoreOutcome,
  type SeparationServiceOptions,
} from './services/SeparationService.js';
export {
  TraversalEngine,
  type SeparationHop,
  type SeparationPath,
} from './utils/TraversalEngine.js';
export { Queue } from './utils/Queue.js';

// Essential types
export {
  actorName,
  graphDataSchema,
  type ActorRecord,
  type GraphData,
  type GraphMetrics,
  type MovieRecord,
} from './schemas/index.js';

// Errors
export * from './errors/index.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export { createModuleLogger, logError, startTimer } from './utils/logger.js';
export { DEFAULT_CONFIG } from './constants/defaults.js';
