import { InvocationTask } from '../../../shared/interfaces/job-invocation.interface';
import { InvocationResult } from '../../../shared/interfaces/invocation-result.interface';
import { PoolStats } from '../../../worker-pool/interfaces/pool-stats.interface';

/**
 * Worker Pool Port (Driven Port)
 * Runs invocations on a fixed set of long-lived workers
 */
export interface WorkerPoolPort {
  /**
   * Run a task on the next idle worker, queueing it when all are busy.
   * Always resolves; timeouts, crashes and a full or closed pool come back as
   * failed results.
   */
  submit(task: InvocationTask): Promise<InvocationResult>;

  /**
   * Whether a submission now would be dispatched or queued instead of refused
   */
  hasCapacity(): boolean;

  getStats(): PoolStats;
}
