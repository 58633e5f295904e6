import { vi } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { AppConfig, buildConfiguration } from '../../../src/config/configuration';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { WorkerPoolPort } from '../../../src/application/ports/output/worker-pool.port';
import { EventPublisherPort } from '../../../src/application/ports/output/event-publisher.port';
import { ExternalToolRunnerPort } from '../../../src/application/ports/output/external-tool-runner.port';
import { PoolStats } from '../../../src/worker-pool/interfaces/pool-stats.interface';

/**
 * Mock Factories for use case, controller and health tests
 */

/**
 * Real ConfigService over a validated configuration; logging silenced.
 */
export function createTestConfig(env: Record<string, string> = {}): ConfigService<AppConfig> {
  return new ConfigService<AppConfig>({
    ...buildConfiguration({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...env }),
  });
}

export function createTestLogger(): PinoLoggerService {
  return new PinoLoggerService(createTestConfig());
}

/**
 * Mock WorkerPoolPort
 */
export function createMockWorkerPool() {
  return {
    submit: vi.fn<WorkerPoolPort['submit']>(),
    hasCapacity: vi.fn<WorkerPoolPort['hasCapacity']>().mockReturnValue(true),
    getStats: vi.fn<WorkerPoolPort['getStats']>(),
  };
}

/**
 * Mock EventPublisherPort
 */
export function createMockEventPublisher() {
  return {
    publish: vi.fn<EventPublisherPort['publish']>().mockResolvedValue(undefined),
    publishAsync: vi.fn<EventPublisherPort['publishAsync']>(),
  };
}

/**
 * Mock ExternalToolRunnerPort
 */
export function createMockToolRunner() {
  return {
    fetchMedia: vi.fn<ExternalToolRunnerPort['fetchMedia']>(),
    transcodeMedia: vi.fn<ExternalToolRunnerPort['transcodeMedia']>(),
    probeVersions: vi.fn<ExternalToolRunnerPort['probeVersions']>(),
  };
}

export function createPoolStats(overrides: Partial<PoolStats> = {}): PoolStats {
  return {
    poolSize: 2,
    readyWorkers: 2,
    activeWorkers: 0,
    idleWorkers: 2,
    queuedInvocations: 0,
    completedInvocations: 0,
    failedInvocations: 0,
    timedOutInvocations: 0,
    workerRestarts: 0,
    averageProcessingTimeMs: 0,
    isShuttingDown: false,
    isHealthy: true,
    ...overrides,
  };
}
