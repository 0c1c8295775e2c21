/**
 * Schema exports - Single source of truth for all Zod schemas and types
 */

export {
  actorName,
  graphDataSchema,
  type GraphData,
  type ActorRecord,
  type MovieRecord,
  type GraphMetrics,
} from './graph.js';
