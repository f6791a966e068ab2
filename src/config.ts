import path from 'path';
import { z } from 'zod';

const DATA_DIR = path.join(__dirname, '..', 'data');

const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  port: z.coerce.number().default(3000),
  host: z.string().default('0.0.0.0'),
  corsOrigins: z.string().transform((s) => s.split(',')).default('*'),

  // Session store (in-memory when unset)
  redisUrl: z.string().optional(),

  // Report generation
  anthropicApiKey: z.string().optional(),
  reportModel: z.string().default('claude-sonnet-4-5-20250929'),
  reportMaxTokens: z.coerce.number().int().positive().default(1500),
  reportTimeoutMs: z.coerce.number().int().positive().default(15000),

  // Question data
  catalogPath: z.string().default(path.join(DATA_DIR, 'questionnaire.json')),
  decisionTreePath: z.string().default(path.join(DATA_DIR, 'decision-tree.json')),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    host: process.env.HOST,
    corsOrigins: process.env.CORS_ORIGINS,
    redisUrl: process.env.REDIS_URL || undefined,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY || undefined,
    reportModel: process.env.REPORT_MODEL,
    reportMaxTokens: process.env.REPORT_MAX_TOKENS,
    reportTimeoutMs: process.env.REPORT_TIMEOUT_MS,
    catalogPath: process.env.CATALOG_PATH,
    decisionTreePath: process.env.DECISION_TREE_PATH,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
