import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PoolManagerService } from '../../../src/worker-pool/pool-manager.service';
import { WorkerFactory } from '../../../src/worker-pool/interfaces/worker-handle.interface';
import { WorkerMessageType } from '../../../src/worker-pool/interfaces/worker-message.interface';
import { InvocationErrorCode } from '../../../src/shared/interfaces/invocation-result.interface';
import { killProcessTree } from '../../../src/shared/process/kill-process-tree';
import { createTestConfig, createTestLogger } from '../helpers/mock-factories';
import {
  MockWorker,
  createArtifact,
  createFetchTask,
  flushMicrotasks,
} from './helpers/mock-factories';

vi.mock('../../../src/shared/process/kill-process-tree', () => ({
  killProcessTree: vi.fn().mockResolvedValue(undefined),
}));

/**
 * PoolManagerService Tests
 *
 * Workers are MockWorker instances handed out by the injected factory; they
 * come online on the next microtask and answer SHUTDOWN like a real thread.
 */
describe('PoolManagerService', () => {
  let workers: MockWorker[];
  let workerOptions: { autoOnline?: boolean; exitOnShutdown?: boolean };

  const factory: WorkerFactory = (workerId) => {
    const worker = new MockWorker(workerId, workerOptions);
    workers.push(worker);
    return worker;
  };

  function createPool(env: Record<string, string> = {}): PoolManagerService {
    return new PoolManagerService(
      createTestConfig({
        WORKER_COUNT: '2',
        TIMEOUT_SECONDS: '1',
        MAX_QUEUED_INVOCATIONS: '1',
        SHUTDOWN_GRACE_SECONDS: '1',
        TEMP_DIR: '/tmp/media-tools-test',
        ...env,
      }),
      createTestLogger(),
      factory,
    );
  }

  async function startPool(env: Record<string, string> = {}): Promise<PoolManagerService> {
    const pool = createPool(env);
    await pool.onModuleInit();
    return pool;
  }

  beforeEach(() => {
    workers = [];
    workerOptions = {};
    vi.useFakeTimers();
    vi.mocked(killProcessTree).mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('initialization', () => {
    it('should start the configured number of workers', async () => {
      const pool = await startPool();

      expect(workers).toHaveLength(2);
      expect(workers.map((worker) => worker.workerId)).toEqual([0, 1]);
      expect(pool.getReadyWorkerCount()).toBe(2);
      expect(pool.getStats().isHealthy).toBe(true);
    });

    it('should reject when a worker never comes online', async () => {
      workerOptions = { autoOnline: false };
      const pool = createPool();

      const init = pool.onModuleInit();
      const assertion = expect(init).rejects.toThrow(
        'Worker 0 did not come online within 5000ms',
      );
      await vi.advanceTimersByTimeAsync(5000);
      await assertion;

      expect(workers[0].terminate).toHaveBeenCalledTimes(1);
    });
  });

  describe('dispatch', () => {
    it('should hand an invocation to an idle worker and resolve with its result', async () => {
      const pool = await startPool();
      const artifact = createArtifact();

      const pending = pool.submit(createFetchTask('inv-1'));

      expect(workers[0].lastRun()).toEqual({
        task: createFetchTask('inv-1'),
        config: {
          tempDir: '/tmp/media-tools-test',
          ytDlpPath: 'yt-dlp',
          ffmpegPath: 'ffmpeg',
        },
      });

      workers[0].complete('inv-1', artifact, 42);

      await expect(pending).resolves.toEqual({
        success: true,
        artifact,
        invocationId: 'inv-1',
        processingTimeMs: 42,
      });
    });

    it('should run invocations on different workers in parallel', async () => {
      const pool = await startPool();

      void pool.submit(createFetchTask('inv-1'));
      void pool.submit(createFetchTask('inv-2'));

      expect(workers[0].lastRun()?.task.invocationId).toBe('inv-1');
      expect(workers[1].lastRun()?.task.invocationId).toBe('inv-2');
      expect(pool.getActiveWorkerCount()).toBe(2);
      expect(pool.getStats().idleWorkers).toBe(0);
    });

    it('should queue invocations in FIFO order while all workers are busy', async () => {
      const pool = await startPool({ WORKER_COUNT: '1', MAX_QUEUED_INVOCATIONS: '2' });
      const artifact = createArtifact();

      const first = pool.submit(createFetchTask('inv-a'));
      const second = pool.submit(createFetchTask('inv-b'));
      const third = pool.submit(createFetchTask('inv-c'));

      expect(pool.getQueueLength()).toBe(2);

      workers[0].complete('inv-a', artifact);
      workers[0].complete('inv-b', artifact);
      workers[0].complete('inv-c', artifact);

      expect(workers[0].runs().map((run) => run.task.invocationId)).toEqual([
        'inv-a',
        'inv-b',
        'inv-c',
      ]);
      const results = await Promise.all([first, second, third]);
      expect(results.map((result) => result.success)).toEqual([true, true, true]);
      expect(pool.getQueueLength()).toBe(0);
    });

    it('should refuse an invocation when the queue is full', async () => {
      const pool = await startPool();

      void pool.submit(createFetchTask('inv-1'));
      void pool.submit(createFetchTask('inv-2'));
      void pool.submit(createFetchTask('inv-3'));

      expect(pool.hasCapacity()).toBe(false);
      await expect(pool.submit(createFetchTask('inv-4'))).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.POOL_UNAVAILABLE,
          message: 'All workers are busy and the queue is full',
        },
        invocationId: 'inv-4',
        processingTimeMs: 0,
      });
    });

    it('should pass tool failures through unchanged', async () => {
      const pool = await startPool();
      const error = {
        code: InvocationErrorCode.TOOL_FAILED,
        message: 'yt-dlp exited with code 1',
        exitCode: 1,
        signal: null,
        stderr: 'ERROR: Unsupported URL',
      };

      const pending = pool.submit(createFetchTask('inv-1'));
      workers[0].fail('inv-1', error, 12);

      await expect(pending).resolves.toEqual({
        success: false,
        error,
        invocationId: 'inv-1',
        processingTimeMs: 12,
      });
      expect(workers[0].terminate).not.toHaveBeenCalled();
    });

    it('should ignore a result for an invocation the worker is not running', async () => {
      const pool = await startPool();

      workers[0].complete('inv-unknown', createArtifact());

      expect(pool.getStats().completedInvocations).toBe(0);
    });
  });

  describe('timeouts', () => {
    it('should fail the invocation with TIMEOUT and replace the worker', async () => {
      const pool = await startPool();

      const pending = pool.submit(createFetchTask('inv-1'));
      workers[0].reportChild(WorkerMessageType.CHILD_SPAWNED, 'inv-1', 777);

      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.TIMEOUT,
          message: 'Invocation exceeded the 1s timeout',
        },
        invocationId: 'inv-1',
        processingTimeMs: 1000,
      });
      expect(killProcessTree).toHaveBeenCalledWith(777);
      expect(workers[0].terminate).toHaveBeenCalledTimes(1);
      expect(workers).toHaveLength(3);
      expect(workers[2].workerId).toBe(0);
    });

    it('should accept new work on the replacement worker', async () => {
      const pool = await startPool();

      void pool.submit(createFetchTask('inv-1'));
      await vi.advanceTimersByTimeAsync(1000);
      await flushMicrotasks();

      void pool.submit(createFetchTask('inv-2'));

      expect(workers[2].lastRun()?.task.invocationId).toBe('inv-2');
      expect(pool.getReadyWorkerCount()).toBe(2);

      const stats = pool.getStats();
      expect(stats.timedOutInvocations).toBe(1);
      expect(stats.failedInvocations).toBe(1);
      expect(stats.workerRestarts).toBe(1);
    });

    it('should ignore a late result from the timed out worker', async () => {
      const pool = await startPool();

      const pending = pool.submit(createFetchTask('inv-1'));
      await vi.advanceTimersByTimeAsync(1000);
      workers[0].complete('inv-1', createArtifact());

      const result = await pending;
      expect(result.success).toBe(false);
      expect(pool.getStats().completedInvocations).toBe(0);
    });

    it('should hold the result back until the tool processes are killed', async () => {
      let finishKill: () => void = () => undefined;
      vi.mocked(killProcessTree).mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            finishKill = resolve;
          }),
      );
      const pool = await startPool();
      let settled = false;

      const pending = pool.submit(createFetchTask('inv-1')).then((result) => {
        settled = true;
        return result;
      });
      workers[0].reportChild(WorkerMessageType.CHILD_SPAWNED, 'inv-1', 777);
      await vi.advanceTimersByTimeAsync(1000);
      await flushMicrotasks();

      expect(killProcessTree).toHaveBeenCalledWith(777);
      expect(settled).toBe(false);

      finishKill();
      const result = await pending;
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(InvocationErrorCode.TIMEOUT);
      }
    });

    it('should not touch a worker that finished in time', async () => {
      const pool = await startPool();

      const pending = pool.submit(createFetchTask('inv-1'));
      await vi.advanceTimersByTimeAsync(400);
      workers[0].complete('inv-1', createArtifact(), 400);
      await vi.advanceTimersByTimeAsync(5000);

      expect((await pending).success).toBe(true);
      expect(workers[0].terminate).not.toHaveBeenCalled();
      expect(pool.getStats().workerRestarts).toBe(0);
    });
  });

  describe('worker crashes', () => {
    it('should fail the running invocation with WORKER_CRASHED on a worker error', async () => {
      const pool = await startPool();

      const pending = pool.submit(createFetchTask('inv-1'));
      workers[0].emit('error', new Error('boom'));

      await expect(pending).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.WORKER_CRASHED,
          message: 'Worker 0 crashed: boom',
        },
        invocationId: 'inv-1',
        processingTimeMs: 0,
      });

      await flushMicrotasks();
      expect(workers).toHaveLength(3);
      expect(pool.getReadyWorkerCount()).toBe(2);
    });

    it('should replace a worker that exits unexpectedly', async () => {
      const pool = await startPool();

      const pending = pool.submit(createFetchTask('inv-1'));
      workers[0].emit('exit', 1);

      const result = await pending;
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          code: InvocationErrorCode.WORKER_CRASHED,
          message: 'Worker 0 exited with code 1',
        });
      }
      expect(pool.getStats().workerRestarts).toBe(1);
    });

    it('should replace an idle worker that crashes', async () => {
      const pool = await startPool();

      workers[1].emit('error', new Error('out of memory'));
      await flushMicrotasks();

      expect(workers[1].terminate).toHaveBeenCalledTimes(1);
      expect(workers[2].workerId).toBe(1);
      expect(pool.getReadyWorkerCount()).toBe(2);
    });
  });

  describe('statistics', () => {
    it('should average processing times over settled invocations', async () => {
      const pool = await startPool();

      const first = pool.submit(createFetchTask('inv-1'));
      const second = pool.submit(createFetchTask('inv-2'));
      workers[0].complete('inv-1', createArtifact(), 40);
      workers[1].fail('inv-2', { code: InvocationErrorCode.TOOL_FAILED, message: 'failed' }, 20);
      await Promise.all([first, second]);

      expect(pool.getStats()).toEqual({
        poolSize: 2,
        readyWorkers: 2,
        activeWorkers: 0,
        idleWorkers: 2,
        queuedInvocations: 0,
        completedInvocations: 1,
        failedInvocations: 1,
        timedOutInvocations: 0,
        workerRestarts: 0,
        averageProcessingTimeMs: 30,
        isShuttingDown: false,
        isHealthy: true,
      });
    });

    it('should report child processes per worker', async () => {
      const pool = await startPool();

      void pool.submit(createFetchTask('inv-1'));
      workers[0].reportChild(WorkerMessageType.CHILD_SPAWNED, 'inv-1', 101);
      workers[0].reportChild(WorkerMessageType.CHILD_SPAWNED, 'inv-1', 102);
      workers[0].reportChild(WorkerMessageType.CHILD_EXITED, 'inv-1', 101);

      const [first] = pool.getWorkerStats();
      expect(first.isActive).toBe(true);
      expect(first.currentInvocationId).toBe('inv-1');
      expect(first.childPids).toEqual([102]);
    });

    it('should collect memory usage from workers that answer the health check', async () => {
      const pool = await startPool();
      const memoryUsage = { rss: 1, heapTotal: 2, heapUsed: 3, external: 4, arrayBuffers: 5 };

      const health = pool.collectWorkerHealth(500);
      expect(workers[0].received.map((message) => message.type)).toEqual([
        WorkerMessageType.HEALTH_CHECK,
      ]);

      workers[0].emit('message', {
        type: WorkerMessageType.HEALTH_RESPONSE,
        payload: { workerId: 0, memoryUsage, uptime: 12 },
        timestamp: Date.now(),
      });
      await vi.advanceTimersByTimeAsync(500);

      const stats = await health;
      expect(stats[0].memoryUsage).toEqual(memoryUsage);
      expect(stats[1].memoryUsage).toBeUndefined();
    });
  });

  describe('shutdown', () => {
    it('should refuse new work and let in-flight invocations finish', async () => {
      const pool = await startPool();
      const artifact = createArtifact();

      const inFlight = pool.submit(createFetchTask('inv-1'));
      const stopping = pool.shutdown();

      expect(pool.shutdown()).toBe(stopping);
      expect(pool.hasCapacity()).toBe(false);
      await expect(pool.submit(createFetchTask('inv-2'))).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.POOL_UNAVAILABLE,
          message: 'Worker pool is shutting down',
        },
        invocationId: 'inv-2',
        processingTimeMs: 0,
      });

      workers[0].complete('inv-1', artifact, 25);
      await stopping;

      await expect(inFlight).resolves.toEqual({
        success: true,
        artifact,
        invocationId: 'inv-1',
        processingTimeMs: 25,
      });
      for (const worker of workers) {
        expect(worker.received[worker.received.length - 1].type).toBe(
          WorkerMessageType.SHUTDOWN,
        );
      }
      expect(pool.getStats().isHealthy).toBe(false);
      expect(pool.getStats().isShuttingDown).toBe(true);
    });

    it('should cancel queued and running invocations once the grace period elapses', async () => {
      const pool = await startPool({ WORKER_COUNT: '1', TIMEOUT_SECONDS: '60' });

      const running = pool.submit(createFetchTask('inv-a'));
      const queued = pool.submit(createFetchTask('inv-b'));

      const stopping = pool.shutdown();
      await vi.advanceTimersByTimeAsync(1000);
      await stopping;

      await expect(queued).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.CANCELLED,
          message: 'Worker pool shut down before the invocation started',
        },
        invocationId: 'inv-b',
        processingTimeMs: 0,
      });
      await expect(running).resolves.toEqual({
        success: false,
        error: { code: InvocationErrorCode.CANCELLED, message: 'yt-dlp was cancelled' },
        invocationId: 'inv-a',
        processingTimeMs: 0,
      });
    });

    it('should report a worker that exits during the drain as crashed', async () => {
      const pool = await startPool();

      const running = pool.submit(createFetchTask('inv-1'));
      const stopping = pool.shutdown();
      workers[0].emit('exit', 1);

      await expect(running).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.WORKER_CRASHED,
          message: 'Worker 0 exited with code 1',
        },
        invocationId: 'inv-1',
        processingTimeMs: 0,
      });
      await stopping;

      expect(workers).toHaveLength(2);
      expect(pool.getStats().workerRestarts).toBe(0);
    });

    it('should terminate a worker that does not exit after SHUTDOWN', async () => {
      workerOptions = { exitOnShutdown: false };
      const pool = await startPool({ WORKER_COUNT: '1', TIMEOUT_SECONDS: '60' });

      const running = pool.submit(createFetchTask('inv-a'));
      workers[0].reportChild(WorkerMessageType.CHILD_SPAWNED, 'inv-a', 555);

      const stopping = pool.shutdown();
      await vi.advanceTimersByTimeAsync(1000 + 5000);
      await stopping;

      expect(workers[0].terminate).toHaveBeenCalledTimes(1);
      expect(killProcessTree).toHaveBeenCalledWith(555);
      await expect(running).resolves.toEqual({
        success: false,
        error: {
          code: InvocationErrorCode.CANCELLED,
          message: 'Worker pool shut down while the invocation was running',
        },
        invocationId: 'inv-a',
        processingTimeMs: 6000,
      });
    });
  });
});
