/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * All settings (port, data directories, record layout sizing, chunk size,
 * suffix list) go through this file so there is one place to look and one
 * place to validate. Every other module imports `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "1440" → 1440) at startup. If anything is invalid the process exits
 * immediately with the error tree. The result is a nested `config` object
 * exported with `as const`.
 *
 * The registry section is handed to the core as explicit option objects
 * (NameNormalizer suffixes, Batcher chunk size, layout width) by the container;
 * the core itself never reads `config`.
 */
import 'dotenv/config';

import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_OFFICERS,
  DEFAULT_NAME_SUFFIXES,
  DEFAULT_RECORD_WIDTH,
} from '@shared/constants';
import { z } from 'zod/v4';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Directory the ingest script reads batch files from. */
  REGISTRY_DATA_DIR: z.string().default('./data'),
  /** Directory segments, the name index and the status document are written to. */
  REGISTRY_OUTPUT_DIR: z.string().default('./data/out'),
  REGISTRY_INPUT_FILE: z.string().default('cordata.txt'),

  REGISTRY_RECORD_WIDTH: z.coerce.number().int().positive().default(DEFAULT_RECORD_WIDTH),
  REGISTRY_MAX_OFFICERS: z.coerce.number().int().min(0).default(DEFAULT_MAX_OFFICERS),
  REGISTRY_CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  REGISTRY_SEGMENT_PREFIX: z.string().min(1).default('cordata'),

  /** Pipe-separated suffix tokens, e.g. ", INC.| INC| LLC". Unset = built-in list. */
  REGISTRY_NAME_SUFFIXES: z.string().optional(),

  /** What to do with a record that fails to decode or repeats a document number. */
  REGISTRY_ON_REJECT: z.enum(['skip', 'halt']).default('skip'),
  REGISTRY_PROGRESS_INTERVAL: z.coerce.number().int().positive().default(10_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

function parseSuffixList(raw: string | undefined): readonly string[] {
  if (raw === undefined || raw.trim() === '') return DEFAULT_NAME_SUFFIXES;
  // Tokens keep their leading space/comma; only empty entries are dropped.
  return raw.split('|').filter((token) => token.trim().length > 0);
}

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  registry: {
    dataDir: env.REGISTRY_DATA_DIR,
    outputDir: env.REGISTRY_OUTPUT_DIR,
    inputFile: env.REGISTRY_INPUT_FILE,
    recordWidth: env.REGISTRY_RECORD_WIDTH,
    maxOfficers: env.REGISTRY_MAX_OFFICERS,
    chunkSize: env.REGISTRY_CHUNK_SIZE,
    segmentPrefix: env.REGISTRY_SEGMENT_PREFIX,
    nameSuffixes: parseSuffixList(env.REGISTRY_NAME_SUFFIXES),
    onReject: env.REGISTRY_ON_REJECT,
    progressInterval: env.REGISTRY_PROGRESS_INTERVAL,
  },
} as const;

export type AppConfig = typeof config;
