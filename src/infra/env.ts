import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file into process.env
dotenv.config();

// Zod schema validates environment variables at runtime
// .default() provides fallback if not set, z.coerce turns the port string into a number
const EnvSchema = z.object({
  DISCORD_TOKEN: z.string().min(1),
  DATABASE_PATH: z.string().default('data/casebridge.db'),
  POLICY_PATH: z.string().default('config/policy.json'),
  INGEST_PORT: z.coerce.number().int().positive().default(7070),
  INGEST_SECRET: z.string().min(16),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

// Parse lazily so the CLI can run without the bot token
let cached: Env | null = null;

export function loadEnv(): Env {
  if (!cached) {
    cached = EnvSchema.parse(process.env);
  }
  return cached;
}

// CLI commands only need storage and policy locations
const StorageEnvSchema = EnvSchema.pick({ DATABASE_PATH: true, POLICY_PATH: true });

export function loadStorageEnv(): z.infer<typeof StorageEnvSchema> {
  return StorageEnvSchema.parse(process.env);
}
