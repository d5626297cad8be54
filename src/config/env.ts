import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required').optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EMBEDDING_MAX_RETRIES: z.coerce.number().int().nonnegative().max(5).default(2),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RAG_BOUNDARY_WINDOW: z.coerce.number().int().nonnegative().default(200),
  RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0),
  RAG_MAX_CONTEXT_CHUNKS: z.coerce.number().int().positive().max(50).default(5),
  RAG_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  RAG_EMBED_CONCURRENCY: z.coerce.number().int().positive().max(32).default(4),
  RAG_RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RAG_LOG_QUERIES: booleanFlag,
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('Invalid environment variables:');
  console.error(parsedEnv.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsedEnv.data;

export type Env = typeof env;

function requireConfig(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`${name} is required for this operation`);
  }
  return value;
}

export function requireMongoUri(): string {
  return requireConfig('MONGODB_URI', env.MONGODB_URI);
}

export function requireOpenAiKey(): string {
  return requireConfig('OPENAI_API_KEY', env.OPENAI_API_KEY);
}
