export interface PoolStats {
  poolSize: number;
  readyWorkers: number;
  activeWorkers: number;
  idleWorkers: number;
  queuedInvocations: number;
  completedInvocations: number;
  failedInvocations: number;
  timedOutInvocations: number;
  workerRestarts: number;
  averageProcessingTimeMs: number;
  isShuttingDown: boolean;
  isHealthy: boolean;
}

export interface WorkerStats {
  workerId: number;
  isReady: boolean;
  isActive: boolean;
  currentInvocationId?: string;
  childPids: number[];
  invocationsCompleted: number;
  invocationsFailed: number;
  restarts: number;
  lastActivityAt: Date;
  memoryUsage?: NodeJS.MemoryUsage;
}
