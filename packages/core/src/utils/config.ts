import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { DEFAULT_CONFIG } from '../constants/defaults.js';

// Environment variables arrive as strings; z.coerce.boolean() would read "false" as true.
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Centralised configuration schema for SixDegrees.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // CLI mode - when true, reduces logging verbosity for better user experience
  CLI_MODE: booleanFlag.default(false),

  // Actor every Bacon Number is measured from
  REFERENCE_ACTOR: z.string().min(1).default(DEFAULT_CONFIG.REFERENCE_ACTOR),

  // Fold repeated movie headings into a single movie record
  MERGE_DUPLICATE_MOVIES: booleanFlag.default(DEFAULT_CONFIG.DATASET.MERGE_DUPLICATE_MOVIES),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }), // .env file
    envAdapter(), // process.env
  ],
});
