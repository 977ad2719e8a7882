import { z } from 'zod';
import { MAX_ALLOCATION_ITERATIONS } from './services/greedy-allocator';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().default(4000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Graph network
  THE_GRAPH_API_KEY: z.string().optional(),
  NETWORK_SUBGRAPH_URL: z
    .string()
    .url()
    .default('https://gateway.thegraph.com/api/subgraphs/id/DZz4kDTdmzWLWsV373w2bSmoar3umKKH9y82SUKr5qmp'),
  PRICE_SUBGRAPH_URL: z
    .string()
    .url()
    .default('https://gateway.thegraph.com/api/subgraphs/id/4RTrnxLZ4H8EBdpAQTcVc7LQY9kk85WNLyVzg5iXFQCH'),
  GRT_ASSET_ADDRESS: z.string().default('0xc944e90c64b2c07662a292be6244bdf05cda44a7'),
  USD_ASSET_ADDRESS: z.string().default('0x0000000000000000000000000000000000000348'),

  // Usage records
  QUERY_VOLUME_DIR: z.string().default('data/hourly_query_volume'),

  // Request handling
  REQUEST_TIMEOUT_MS: z.coerce.number().positive().default(30000),
  MAX_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().nonnegative().default(1000),
  SOURCE_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),

  // Optimizer defaults
  DEFAULT_BUDGET: z.coerce.number().nonnegative().default(10000),
  DEFAULT_CANDIDATE_COUNT: z.coerce.number().int().min(1).default(5),
  DEFAULT_MIN_WEEKLY_QUERIES: z.coerce.number().nonnegative().default(0),
  DEFAULT_ALLOCATION_STEP: z.coerce.number().positive().default(100),
  DEFAULT_WINDOW_DAYS: z.coerce.number().positive().default(7),
  DEFAULT_TOP_N: z.coerce.number().int().min(1).default(5),

  WALLET_ADDRESS: z.string().optional(),
});

export const env = envSchema.parse(process.env);

export type Env = typeof env;

const addressRegex = /^0x[a-fA-F0-9]{40}$/;

/**
 * 0x-prefixed EVM address, normalised to lower case
 */
export const walletAddressSchema = z
  .string()
  .trim()
  .refine((value) => addressRegex.test(value), {
    message: 'Invalid EVM address. Expected 0x-prefixed 40 byte hex string.',
  })
  .transform((value) => value.toLowerCase());

/**
 * Per-pass optimizer options. Anything left out falls back to the env defaults.
 */
export const optimizerOptionsSchema = z
  .object({
    budget: z.coerce.number().nonnegative().default(env.DEFAULT_BUDGET),
    candidateCount: z.coerce.number().int().min(1).default(env.DEFAULT_CANDIDATE_COUNT),
    minWeeklyQueries: z.coerce.number().nonnegative().default(env.DEFAULT_MIN_WEEKLY_QUERIES),
    step: z.coerce.number().positive().default(env.DEFAULT_ALLOCATION_STEP),
    windowDays: z.coerce.number().positive().default(env.DEFAULT_WINDOW_DAYS),
    topN: z.coerce.number().int().min(1).default(env.DEFAULT_TOP_N),
    wallet: walletAddressSchema.optional(),
  })
  .refine((options) => Math.ceil(options.budget / options.step) <= MAX_ALLOCATION_ITERATIONS, {
    message: `budget / step must not exceed ${MAX_ALLOCATION_ITERATIONS} allocation steps`,
    path: ['budget'],
  });

export type OptimizerOptionsInput = z.input<typeof optimizerOptionsSchema>;
export type OptimizerOptions = z.output<typeof optimizerOptionsSchema>;

if (env.NODE_ENV === 'production' && !env.THE_GRAPH_API_KEY) {
  console.warn('THE_GRAPH_API_KEY is not set; gateway requests will be rejected in production.');
}
