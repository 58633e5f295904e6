/**
 * Application Configuration
 *
 * Central configuration for the media tool service. Values come from three
 * sources, highest precedence first:
 *
 * 1. Launcher flags (`--bind`, `--workers`, `--timeout`), the same flags the
 *    container entry point passes
 * 2. Environment variables (`.env` file or system environment)
 * 3. Defaults declared in `validation.schema.ts`
 *
 * Everything is validated by the Zod schema before it is exposed as a typed
 * {@link AppConfig}.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const pool = this.configService.getOrThrow('workerPool', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { parseArgs } from 'util';
import { validateEnv, EnvConfig } from './validation.schema';

/**
 * Application configuration interface, grouped by concern.
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  server: {
    host: string;
    port: number;
  };
  /**
   * Worker pool configuration.
   *
   * ### workerCount (WORKER_COUNT, --workers)
   * - Number of long-lived workers; each runs one invocation at a time
   * - Tool invocations are CPU heavy (transcoding) or network bound
   *   (downloading), so keep this at or below the container's vCPU count
   *
   * ### timeoutMs (TIMEOUT_SECONDS, --timeout)
   * - Wall-clock limit for one invocation, counted from dispatch to a worker
   * - On expiry the caller gets a TIMEOUT error and the worker is replaced
   *
   * ### maxQueuedInvocations (MAX_QUEUED_INVOCATIONS)
   * - Invocations waiting for an idle worker; beyond this new requests are
   *   refused with POOL_UNAVAILABLE
   *
   * ### shutdownGraceMs (SHUTDOWN_GRACE_SECONDS)
   * - How long shutdown waits for accepted invocations before cancelling them
   */
  workerPool: {
    workerCount: number;
    timeoutMs: number;
    maxQueuedInvocations: number;
    shutdownGraceMs: number;
    workerStartTimeoutMs: number;
  };
  tools: {
    tempDir: string;
    ytDlpPath: string;
    ffmpegPath: string;
  };
}

/**
 * Parse launcher flags into the environment variables they override.
 */
export function parseLauncherFlags(argv: string[]): Record<string, string> {
  const { values } = parseArgs({
    args: argv,
    options: {
      bind: { type: 'string', short: 'b' },
      workers: { type: 'string', short: 'w' },
      timeout: { type: 'string', short: 't' },
    },
    strict: true,
    allowPositionals: false,
  });

  const overrides: Record<string, string> = {};
  if (values.bind !== undefined) overrides.BIND_ADDRESS = values.bind;
  if (values.workers !== undefined) overrides.WORKER_COUNT = values.workers;
  if (values.timeout !== undefined) overrides.TIMEOUT_SECONDS = values.timeout;
  return overrides;
}

export function buildConfiguration(
  env: Record<string, string | undefined>,
  argv: string[] = [],
): AppConfig {
  const validated: EnvConfig = validateEnv({ ...env, ...parseLauncherFlags(argv) });

  return {
    nodeEnv: validated.NODE_ENV,
    logLevel: validated.LOG_LEVEL,
    server: {
      host: validated.BIND_ADDRESS.host,
      port: validated.PORT ?? validated.BIND_ADDRESS.port,
    },
    workerPool: {
      workerCount: validated.WORKER_COUNT,
      timeoutMs: validated.TIMEOUT_SECONDS * 1000,
      maxQueuedInvocations: validated.MAX_QUEUED_INVOCATIONS,
      shutdownGraceMs: validated.SHUTDOWN_GRACE_SECONDS * 1000,
      workerStartTimeoutMs: validated.WORKER_START_TIMEOUT_MS,
    },
    tools: {
      tempDir: validated.TEMP_DIR,
      ytDlpPath: validated.YTDLP_PATH,
      ffmpegPath: validated.FFMPEG_PATH,
    },
  };
}

export default (): AppConfig => buildConfiguration(process.env, process.argv.slice(2));
