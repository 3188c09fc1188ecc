import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .transform(value => value.trim().toLowerCase())
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

export const envSchema = z.object({
  // NODE_ENV is set by the tooling that launches the process (don't set in .env)
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  // Local zip path or remote URL of the plugin manifest bundle. Checked when a
  // synchronization pass starts, not at boot, so lookups keep working without it.
  PLUGINS_ZIP_PATH: z.string().trim().optional(),
  PLUGINS_SYNC_ON_START: booleanFlag.default(true),
  PLUGINS_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
