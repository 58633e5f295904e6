import { Inject, Injectable, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'events';
import { AppConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { killProcessTree } from '../shared/process/kill-process-tree';
import { InvocationTask } from '../shared/interfaces/job-invocation.interface';
import {
  InvocationErrorCode,
  InvocationResult,
} from '../shared/interfaces/invocation-result.interface';
import { WorkerPoolPort } from '../application/ports/output/worker-pool.port';
import {
  WorkerMessage,
  WorkerMessageType,
  WorkerOutboundMessage,
  RunInvocationPayload,
  WorkerConfig,
  HealthResponsePayload,
} from './interfaces/worker-message.interface';
import { PoolStats, WorkerStats } from './interfaces/pool-stats.interface';
import { WORKER_FACTORY, WorkerFactory, WorkerHandle } from './interfaces/worker-handle.interface';

/**
 * How long a stopping worker gets to exit after SHUTDOWN before it is
 * terminated.
 */
const WORKER_STOP_TIMEOUT_MS = 5000;

/** Delay before retrying a worker that failed to come back online */
const RESTART_RETRY_DELAY_MS = 1000;

const HEALTH_RESPONSE_TIMEOUT_MS = 1000;

/**
 * An accepted invocation and the resolver of its caller's promise.
 */
interface PendingInvocation {
  task: InvocationTask;
  resolve: (result: InvocationResult) => void;
  queuedAt: number;
}

interface InFlightInvocation extends PendingInvocation {
  dispatchedAt: number;
  timeoutTimer: NodeJS.Timeout;
}

/**
 * Wrapper for one pool slot.
 *
 * - retired: set once the pool has given up on this thread (timeout, crash,
 *   shutdown); late messages and exit events from it are ignored
 * - stopping: SHUTDOWN was sent, so an exit is expected
 * - childPids: tool processes the thread reported as running, killed by the
 *   pool when the thread is terminated
 */
interface WorkerWrapper {
  worker: WorkerHandle;
  workerId: number;
  isReady: boolean;
  retired: boolean;
  stopping: boolean;
  current?: InFlightInvocation;
  childPids: Set<number>;
  invocationsCompleted: number;
  invocationsFailed: number;
  restarts: number;
  lastActivityAt: Date;
  memoryUsage?: NodeJS.MemoryUsage;
  rejectStart?: (error: Error) => void;
}

/**
 * Worker Pool Manager Service
 *
 * Runs tool invocations on a fixed number of long-lived worker threads, one
 * invocation per worker at a time.
 *
 * ## Key Responsibilities:
 *
 * 1. **Worker Lifecycle**
 *    - Starts `workerCount` workers on module init
 *    - Replaces a worker that crashes, exits, or overruns its timeout; the
 *      replacement keeps the same workerId
 *
 * 2. **Dispatch**
 *    - Hands an invocation to the first idle worker
 *    - Queues it (FIFO, bounded by `maxQueuedInvocations`) when all are busy
 *
 * 3. **Timeouts**
 *    - A timer starts when an invocation is dispatched
 *    - On expiry the caller gets TIMEOUT, the worker's tool processes are
 *      killed, the worker is terminated and restarted
 *
 * 4. **Graceful Shutdown**
 *    - Refuses new work, lets in-flight and queued invocations finish for up
 *      to `shutdownGraceMs`, cancels the rest, then stops the workers
 *
 * `submit()` never rejects. Every outcome, including the pool's own failures,
 * is an {@link InvocationResult}.
 *
 * ## Events:
 * - `invocationSettled` (InvocationResult)
 * - `health` (HealthResponsePayload)
 */
@Injectable()
export class PoolManagerService
  extends EventEmitter
  implements WorkerPoolPort, OnModuleInit, OnModuleDestroy
{
  private workers: Map<number, WorkerWrapper> = new Map();

  /**
   * FIFO queue of invocations waiting for an idle worker.
   */
  private queue: PendingInvocation[] = [];

  private isShuttingDown = false;
  private shutdownPromise?: Promise<void>;
  private restartTimers: Set<NodeJS.Timeout> = new Set();

  private readonly poolSize: number;
  private readonly timeoutMs: number;
  private readonly maxQueuedInvocations: number;
  private readonly shutdownGraceMs: number;
  private readonly workerStartTimeoutMs: number;
  private readonly workerConfig: WorkerConfig;

  private completedCount = 0;
  private failedCount = 0;
  private timedOutCount = 0;
  private restartCount = 0;

  /**
   * Sum of processing times of every dispatched invocation that settled.
   */
  private totalProcessingTimeMs = 0;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
    @Inject(WORKER_FACTORY) private readonly workerFactory: WorkerFactory,
  ) {
    super();

    const workerPoolConfig = this.configService.getOrThrow('workerPool', { infer: true });
    const toolsConfig = this.configService.getOrThrow('tools', { infer: true });

    this.poolSize = workerPoolConfig.workerCount;
    this.timeoutMs = workerPoolConfig.timeoutMs;
    this.maxQueuedInvocations = workerPoolConfig.maxQueuedInvocations;
    this.shutdownGraceMs = workerPoolConfig.shutdownGraceMs;
    this.workerStartTimeoutMs = workerPoolConfig.workerStartTimeoutMs;

    this.workerConfig = {
      tempDir: toolsConfig.tempDir,
      ytDlpPath: toolsConfig.ytDlpPath,
      ffmpegPath: toolsConfig.ffmpegPath,
    };

    this.logger.setContext(PoolManagerService.name);
  }

  async onModuleInit(): Promise<void> {
    await this.initializePool();
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  private async initializePool(): Promise<void> {
    this.logger.info(
      { poolSize: this.poolSize, timeoutMs: this.timeoutMs },
      'Initializing worker pool',
    );

    for (let i = 0; i < this.poolSize; i++) {
      await this.startWorker(i, 0);
    }

    this.logger.info(
      { poolSize: this.poolSize, readyWorkers: this.getReadyWorkerCount() },
      'Worker pool initialized',
    );
  }

  /**
   * Start a worker under `workerId`, replacing whatever wrapper held that id.
   * Resolves once the thread is online.
   */
  private startWorker(workerId: number, restarts: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const worker = this.workerFactory(workerId);

      const wrapper: WorkerWrapper = {
        worker,
        workerId,
        isReady: false,
        retired: false,
        stopping: false,
        childPids: new Set(),
        invocationsCompleted: 0,
        invocationsFailed: 0,
        restarts,
        lastActivityAt: new Date(),
      };
      this.workers.set(workerId, wrapper);

      const startTimer = setTimeout(() => {
        this.handleWorkerFailure(
          wrapper,
          `Worker ${workerId} did not come online within ${this.workerStartTimeoutMs}ms`,
        );
      }, this.workerStartTimeoutMs);

      wrapper.rejectStart = (error) => {
        clearTimeout(startTimer);
        reject(error);
      };

      worker.on('message', (message: WorkerOutboundMessage) => {
        this.handleWorkerMessage(wrapper, message);
      });

      worker.on('error', (error: Error) => {
        this.logger.error({ workerId, error: error.message }, 'Worker error');
        this.handleWorkerFailure(wrapper, `Worker ${workerId} crashed: ${error.message}`);
      });

      worker.on('exit', (code: number) => {
        if (wrapper.retired || wrapper.stopping) return;
        this.logger.warn({ workerId, code }, 'Worker exited unexpectedly');
        this.handleWorkerFailure(wrapper, `Worker ${workerId} exited with code ${code}`);
      });

      worker.once('online', () => {
        clearTimeout(startTimer);
        wrapper.rejectStart = undefined;
        if (wrapper.retired) return;

        wrapper.isReady = true;
        wrapper.lastActivityAt = new Date();
        this.logger.debug({ workerId, restarts }, 'Worker online');
        resolve();
        this.processNextInQueue();
      });
    });
  }

  private restartWorker(workerId: number, restarts: number): void {
    if (this.isShuttingDown) return;

    this.restartCount++;
    this.logger.info({ workerId, restarts }, 'Restarting worker');

    this.startWorker(workerId, restarts).catch((error: Error) => {
      this.logger.error({ workerId, error: error.message }, 'Failed to restart worker');
      if (this.isShuttingDown) return;

      const timer = setTimeout(() => {
        this.restartTimers.delete(timer);
        this.restartWorker(workerId, restarts + 1);
      }, RESTART_RETRY_DELAY_MS);
      this.restartTimers.add(timer);
    });
  }

  private handleWorkerMessage(wrapper: WorkerWrapper, message: WorkerOutboundMessage): void {
    if (wrapper.retired) return;

    wrapper.lastActivityAt = new Date();

    switch (message.type) {
      case WorkerMessageType.INVOCATION_COMPLETED: {
        const { invocationId, artifact, processingTimeMs } = message.payload;
        this.handleInvocationSettled(wrapper, {
          success: true,
          artifact,
          invocationId,
          processingTimeMs,
        });
        break;
      }

      case WorkerMessageType.INVOCATION_FAILED: {
        const { invocationId, error, processingTimeMs } = message.payload;
        this.handleInvocationSettled(wrapper, {
          success: false,
          error,
          invocationId,
          processingTimeMs,
        });
        break;
      }

      case WorkerMessageType.CHILD_SPAWNED:
        wrapper.childPids.add(message.payload.pid);
        break;

      case WorkerMessageType.CHILD_EXITED:
        wrapper.childPids.delete(message.payload.pid);
        break;

      case WorkerMessageType.HEALTH_RESPONSE:
        wrapper.memoryUsage = message.payload.memoryUsage;
        this.emit('health', { ...message.payload, workerId: wrapper.workerId });
        break;
    }
  }

  private handleInvocationSettled(wrapper: WorkerWrapper, result: InvocationResult): void {
    const current = wrapper.current;
    if (!current || current.task.invocationId !== result.invocationId) {
      this.logger.warn(
        { workerId: wrapper.workerId, invocationId: result.invocationId },
        'Result for an invocation the worker is not running',
      );
      return;
    }

    clearTimeout(current.timeoutTimer);
    wrapper.current = undefined;
    wrapper.childPids.clear();

    if (result.success) {
      wrapper.invocationsCompleted++;
    } else {
      wrapper.invocationsFailed++;
    }

    this.settle(current, result);
    this.processNextInQueue();
  }

  private handleTimeout(wrapper: WorkerWrapper, invocationId: string): void {
    const current = wrapper.current;
    if (!current || current.task.invocationId !== invocationId) return;

    wrapper.current = undefined;
    wrapper.invocationsFailed++;

    this.logger.warn(
      { workerId: wrapper.workerId, invocationId, timeoutMs: this.timeoutMs },
      'Invocation timed out, terminating worker',
    );

    const result: InvocationResult = {
      success: false,
      error: {
        code: InvocationErrorCode.TIMEOUT,
        message: `Invocation exceeded the ${this.timeoutMs / 1000}s timeout`,
      },
      invocationId,
      processingTimeMs: Date.now() - current.dispatchedAt,
    };

    // the caller sweeps <invocationId>.* once it has the result, so the tool
    // has to be dead by then
    void this.replaceWorker(wrapper).then(() => this.settle(current, result));
  }

  /**
   * A worker errored, exited on its own, or never came online.
   */
  private handleWorkerFailure(wrapper: WorkerWrapper, reason: string): void {
    if (wrapper.retired) return;

    if (!wrapper.isReady) {
      void this.retire(wrapper);
      const rejectStart = wrapper.rejectStart;
      wrapper.rejectStart = undefined;
      rejectStart?.(new Error(reason));
      return;
    }

    const current = wrapper.current;
    if (!current) {
      void this.replaceWorker(wrapper);
      return;
    }

    clearTimeout(current.timeoutTimer);
    wrapper.current = undefined;
    wrapper.invocationsFailed++;

    const result: InvocationResult = {
      success: false,
      error: { code: InvocationErrorCode.WORKER_CRASHED, message: reason },
      invocationId: current.task.invocationId,
      processingTimeMs: Date.now() - current.dispatchedAt,
    };
    void this.replaceWorker(wrapper).then(() => this.settle(current, result));
  }

  /**
   * Retire the thread and start its replacement. Resolves once the retired
   * thread's tool processes have been killed.
   */
  private replaceWorker(wrapper: WorkerWrapper): Promise<void> {
    const killed = this.retire(wrapper);
    this.restartWorker(wrapper.workerId, wrapper.restarts + 1);
    return killed;
  }

  /**
   * Give up on a thread: stop routing to it, kill its tool processes and
   * terminate it. Resolves when the tool processes are gone; never rejects.
   */
  private retire(wrapper: WorkerWrapper): Promise<void> {
    wrapper.retired = true;
    wrapper.isReady = false;
    const killed = this.killChildProcesses(wrapper);

    wrapper.worker.terminate().catch((error: Error) => {
      this.logger.error(
        { workerId: wrapper.workerId, error: error.message },
        'Failed to terminate worker',
      );
    });

    return killed;
  }

  private async killChildProcesses(wrapper: WorkerWrapper): Promise<void> {
    const pids = Array.from(wrapper.childPids);
    wrapper.childPids.clear();

    await Promise.all(
      pids.map((pid) => {
        this.logger.debug({ workerId: wrapper.workerId, pid }, 'Killing tool process tree');
        return killProcessTree(pid).catch((error: Error) => {
          this.logger.error(
            { workerId: wrapper.workerId, pid, error: error.message },
            'Failed to kill tool process',
          );
        });
      }),
    );
  }

  private settle(pending: PendingInvocation, result: InvocationResult): void {
    if (result.success) {
      this.completedCount++;
    } else {
      this.failedCount++;
      if (result.error.code === InvocationErrorCode.TIMEOUT) this.timedOutCount++;
    }
    this.totalProcessingTimeMs += result.processingTimeMs;

    pending.resolve(result);
    this.emit('invocationSettled', result);
  }

  /**
   * Submit an invocation to the pool.
   *
   * ## Flow:
   * 1. Shutting down: resolve POOL_UNAVAILABLE
   * 2. Idle worker available: dispatch immediately
   * 3. Queue has room: wait in FIFO order
   * 4. Queue full: resolve POOL_UNAVAILABLE
   *
   * @returns the invocation's result; never rejects
   */
  submit(task: InvocationTask): Promise<InvocationResult> {
    if (this.isShuttingDown) {
      return Promise.resolve(this.unavailable(task, 'Worker pool is shutting down'));
    }

    return new Promise((resolve) => {
      const pending: PendingInvocation = { task, resolve, queuedAt: Date.now() };

      const idleWorker = this.getIdleWorker();
      if (idleWorker) {
        this.dispatchToWorker(idleWorker, pending);
        return;
      }

      if (this.queue.length >= this.maxQueuedInvocations) {
        this.logger.warn(
          { invocationId: task.invocationId, queueLength: this.queue.length },
          'Invocation refused, queue is full',
        );
        resolve(this.unavailable(task, 'All workers are busy and the queue is full'));
        return;
      }

      this.queue.push(pending);
      this.logger.debug(
        { invocationId: task.invocationId, queueLength: this.queue.length },
        'Invocation queued',
      );
    });
  }

  private unavailable(task: InvocationTask, message: string): InvocationResult {
    return {
      success: false,
      error: { code: InvocationErrorCode.POOL_UNAVAILABLE, message },
      invocationId: task.invocationId,
      processingTimeMs: 0,
    };
  }

  private getIdleWorker(): WorkerWrapper | null {
    for (const wrapper of this.workers.values()) {
      if (wrapper.isReady && !wrapper.retired && !wrapper.current) {
        return wrapper;
      }
    }
    return null;
  }

  private dispatchToWorker(wrapper: WorkerWrapper, pending: PendingInvocation): void {
    const { invocationId } = pending.task;
    const dispatchedAt = Date.now();

    wrapper.current = {
      ...pending,
      dispatchedAt,
      timeoutTimer: setTimeout(() => this.handleTimeout(wrapper, invocationId), this.timeoutMs),
    };
    wrapper.lastActivityAt = new Date();

    const message: WorkerMessage<RunInvocationPayload> = {
      type: WorkerMessageType.RUN_INVOCATION,
      payload: {
        task: pending.task,
        config: this.workerConfig,
      },
      timestamp: Date.now(),
    };

    try {
      wrapper.worker.postMessage(message);
    } catch (error) {
      this.handleInvocationSettled(wrapper, {
        success: false,
        error: {
          code: InvocationErrorCode.UNKNOWN,
          message: `Could not hand the invocation to worker ${wrapper.workerId}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        },
        invocationId,
        processingTimeMs: 0,
      });
      return;
    }

    this.logger.debug(
      {
        invocationId,
        workerId: wrapper.workerId,
        queuedForMs: dispatchedAt - pending.queuedAt,
      },
      'Invocation dispatched to worker',
    );
  }

  private processNextInQueue(): void {
    while (this.queue.length > 0) {
      const idleWorker = this.getIdleWorker();
      if (!idleWorker) return;

      const next = this.queue.shift();
      if (!next) return;
      this.dispatchToWorker(idleWorker, next);
    }
  }

  hasCapacity(): boolean {
    if (this.isShuttingDown) return false;
    return this.getIdleWorker() !== null || this.queue.length < this.maxQueuedInvocations;
  }

  getReadyWorkerCount(): number {
    let count = 0;
    for (const wrapper of this.workers.values()) {
      if (wrapper.isReady && !wrapper.retired) count++;
    }
    return count;
  }

  getActiveWorkerCount(): number {
    let count = 0;
    for (const wrapper of this.workers.values()) {
      if (wrapper.current) count++;
    }
    return count;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getStats(): PoolStats {
    const readyWorkers = this.getReadyWorkerCount();
    const activeWorkers = this.getActiveWorkerCount();
    const settled = this.completedCount + this.failedCount;

    return {
      poolSize: this.poolSize,
      readyWorkers,
      activeWorkers,
      idleWorkers: Math.max(readyWorkers - activeWorkers, 0),
      queuedInvocations: this.queue.length,
      completedInvocations: this.completedCount,
      failedInvocations: this.failedCount,
      timedOutInvocations: this.timedOutCount,
      workerRestarts: this.restartCount,
      averageProcessingTimeMs: settled > 0 ? this.totalProcessingTimeMs / settled : 0,
      isShuttingDown: this.isShuttingDown,
      isHealthy: !this.isShuttingDown && readyWorkers >= Math.ceil(this.poolSize / 2),
    };
  }

  getWorkerStats(): WorkerStats[] {
    return Array.from(this.workers.values()).map((wrapper) => ({
      workerId: wrapper.workerId,
      isReady: wrapper.isReady && !wrapper.retired,
      isActive: wrapper.current !== undefined,
      currentInvocationId: wrapper.current?.task.invocationId,
      childPids: Array.from(wrapper.childPids),
      invocationsCompleted: wrapper.invocationsCompleted,
      invocationsFailed: wrapper.invocationsFailed,
      restarts: wrapper.restarts,
      lastActivityAt: wrapper.lastActivityAt,
      memoryUsage: wrapper.memoryUsage,
    }));
  }

  /**
   * Ask every ready worker for its memory usage and wait (briefly) for the
   * answers. Workers stay responsive while their tool runs in a child process.
   */
  async collectWorkerHealth(
    timeoutMs: number = HEALTH_RESPONSE_TIMEOUT_MS,
  ): Promise<WorkerStats[]> {
    const ready = Array.from(this.workers.values()).filter(
      (wrapper) => wrapper.isReady && !wrapper.retired,
    );

    await Promise.all(
      ready.map(
        (wrapper) =>
          new Promise<void>((resolve) => {
            const done = (): void => {
              clearTimeout(timer);
              this.off('health', onHealth);
              resolve();
            };
            const onHealth = (payload: HealthResponsePayload): void => {
              if (payload.workerId === wrapper.workerId) done();
            };
            const timer = setTimeout(done, timeoutMs);

            this.on('health', onHealth);
            const message: WorkerMessage<null> = {
              type: WorkerMessageType.HEALTH_CHECK,
              payload: null,
              timestamp: Date.now(),
            };
            wrapper.worker.postMessage(message);
          }),
      ),
    );

    return this.getWorkerStats();
  }

  /**
   * Graceful shutdown; safe to call more than once.
   *
   * 1. New submissions resolve POOL_UNAVAILABLE
   * 2. In-flight and queued invocations get `shutdownGraceMs` to finish
   * 3. Invocations still queued after that are cancelled
   * 4. Workers receive SHUTDOWN (a busy worker aborts its tool and reports
   *    CANCELLED) and are terminated if they do not exit in time
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    this.isShuttingDown = true;

    for (const timer of this.restartTimers) clearTimeout(timer);
    this.restartTimers.clear();

    this.logger.info(
      {
        inFlight: this.getActiveWorkerCount(),
        queued: this.queue.length,
        graceMs: this.shutdownGraceMs,
      },
      'Shutting down worker pool',
    );

    const drained = await this.waitForDrain(this.shutdownGraceMs);
    if (!drained) {
      this.logger.warn(
        { inFlight: this.getActiveWorkerCount(), queued: this.queue.length },
        'Grace period elapsed, cancelling remaining invocations',
      );
    }

    const leftovers = this.queue;
    this.queue = [];
    for (const pending of leftovers) {
      this.settle(pending, {
        success: false,
        error: {
          code: InvocationErrorCode.CANCELLED,
          message: 'Worker pool shut down before the invocation started',
        },
        invocationId: pending.task.invocationId,
        processingTimeMs: 0,
      });
    }

    await Promise.all(Array.from(this.workers.values()).map((wrapper) => this.stopWorker(wrapper)));

    for (const wrapper of this.workers.values()) {
      const current = wrapper.current;
      if (!current) continue;

      clearTimeout(current.timeoutTimer);
      wrapper.current = undefined;
      this.settle(current, {
        success: false,
        error: {
          code: InvocationErrorCode.CANCELLED,
          message: 'Worker pool shut down while the invocation was running',
        },
        invocationId: current.task.invocationId,
        processingTimeMs: Date.now() - current.dispatchedAt,
      });
    }

    this.workers.clear();
    this.logger.info('Worker pool shut down');
  }

  private isDrained(): boolean {
    return this.queue.length === 0 && this.getActiveWorkerCount() === 0;
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.isDrained()) return Promise.resolve(true);

    return new Promise((resolve) => {
      const onSettled = (): void => {
        if (!this.isDrained()) return;
        clearTimeout(timer);
        this.off('invocationSettled', onSettled);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.off('invocationSettled', onSettled);
        resolve(false);
      }, timeoutMs);

      this.on('invocationSettled', onSettled);
    });
  }

  private stopWorker(wrapper: WorkerWrapper): Promise<void> {
    if (wrapper.retired) return Promise.resolve();

    if (!wrapper.isReady) {
      return this.retire(wrapper);
    }

    wrapper.stopping = true;

    return new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        this.logger.warn({ workerId: wrapper.workerId }, 'Worker did not stop in time');
        void this.retire(wrapper).then(resolve);
      }, WORKER_STOP_TIMEOUT_MS);

      wrapper.worker.once('exit', () => {
        clearTimeout(timeout);
        wrapper.retired = true;
        wrapper.isReady = false;
        void this.killChildProcesses(wrapper).then(resolve);
      });

      const message: WorkerMessage<null> = {
        type: WorkerMessageType.SHUTDOWN,
        payload: null,
        timestamp: Date.now(),
      };
      wrapper.worker.postMessage(message);
    });
  }
}
