import { z } from 'zod';

const bindAddress = z
  .string()
  .regex(/^[^:\s]+:\d{1,5}$/, 'expected host:port')
  .transform((value) => {
    const separator = value.lastIndexOf(':');
    return {
      host: value.slice(0, separator),
      port: Number(value.slice(separator + 1)),
    };
  })
  .refine((bind) => bind.port > 0 && bind.port <= 65535, 'port must be between 1 and 65535');

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Launcher
  BIND_ADDRESS: bindAddress.default('0.0.0.0:8080'),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  WORKER_COUNT: z.coerce.number().int().min(1).max(32).default(2),
  TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(600),
  MAX_QUEUED_INVOCATIONS: z.coerce.number().int().min(0).default(64),
  SHUTDOWN_GRACE_SECONDS: z.coerce.number().int().min(0).default(30),
  WORKER_START_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  // External tools
  TEMP_DIR: z.string().min(1).default('/tmp/media-tools'),
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
