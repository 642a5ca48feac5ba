import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file if it exists
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

// 空字串視為未設定
const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const ServerSchema = z.object({
  port: z.coerce.number().default(8080),
  env: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFile: z.string().optional(),
});

const ProviderSchema = z.object({
  apiKey: optionalSecret,
  network: z.string().default('eth-mainnet'),
  timeoutMs: z.coerce.number().int().positive().default(10000),
  maxCount: z.coerce.number().int().positive().default(500),
});

const WhalesSchema = z.object({
  cacheTtlMs: z.coerce.number().int().nonnegative().default(30000),
  maxLimit: z.coerce.number().int().positive().default(1000),
});

const LlmSchema = z.object({
  apiKey: optionalSecret,
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  model: z.string().default('gpt-4.1-mini'),
  timeoutMs: z.coerce.number().int().positive().default(30000),
});

const ConfigSchema = z.object({
  server: ServerSchema,
  provider: ProviderSchema,
  whales: WhalesSchema,
  llm: LlmSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

// Helper to map environment variables to the schema
const getEnvConfig = (env: NodeJS.ProcessEnv) => ({
  server: {
    port: env.PORT,
    env: env.NODE_ENV || env.ENVIRONMENT,
    logLevel: env.LOG_LEVEL,
    logFile: env.LOG_FILE,
  },
  provider: {
    apiKey: env.ALCHEMY_API_KEY,
    network: env.ALCHEMY_NETWORK,
    timeoutMs: env.PROVIDER_TIMEOUT_MS,
    maxCount: env.PROVIDER_MAX_COUNT,
  },
  whales: {
    cacheTtlMs: env.WHALE_CACHE_TTL_MS,
    maxLimit: env.WHALE_MAX_LIMIT,
  },
  llm: {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    model: env.OPENAI_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS,
  },
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config =>
  ConfigSchema.parse(getEnvConfig(env));

export const config = loadConfig();
