import { Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { PoolManagerService } from '../../worker-pool/pool-manager.service';

@Injectable()
export class WorkerPoolHealthIndicator extends HealthIndicator {
  constructor(private readonly poolManager: PoolManagerService) {
    super();
  }

  async isHealthy(key: string, withWorkers = false): Promise<HealthIndicatorResult> {
    const stats = this.poolManager.getStats();

    const details = {
      poolSize: stats.poolSize,
      readyWorkers: stats.readyWorkers,
      activeWorkers: stats.activeWorkers,
      idleWorkers: stats.idleWorkers,
      queuedInvocations: stats.queuedInvocations,
      completedInvocations: stats.completedInvocations,
      failedInvocations: stats.failedInvocations,
      timedOutInvocations: stats.timedOutInvocations,
      workerRestarts: stats.workerRestarts,
      averageProcessingTimeMs: Math.round(stats.averageProcessingTimeMs),
      ...(withWorkers && { workers: await this.poolManager.collectWorkerHealth() }),
    };

    if (stats.isHealthy) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      stats.isShuttingDown
        ? 'Worker pool is shutting down'
        : 'Worker pool is unhealthy - insufficient workers running',
      this.getStatus(key, false, details),
    );
  }
}
