/**
 * Worker Thread Communication Protocol
 *
 * Messages exchanged between the main thread (PoolManagerService) and the
 * worker threads.
 *
 * ## Communication Model:
 * - **Main → Worker**: RUN_INVOCATION, HEALTH_CHECK, SHUTDOWN
 * - **Worker → Main**: INVOCATION_COMPLETED, INVOCATION_FAILED, CHILD_SPAWNED,
 *   CHILD_EXITED, HEALTH_RESPONSE
 *
 * ## Message Flow Example:
 * ```
 * Main Thread                Worker Thread
 *     |                           |
 *     |---RUN_INVOCATION--------->|
 *     |<-------CHILD_SPAWNED------| (yt-dlp / ffmpeg started)
 *     |<-------CHILD_EXITED-------|
 *     |<---INVOCATION_COMPLETED---|
 *     |                           |
 *     |---SHUTDOWN--------------->|
 *     |                           | (aborts current run, exits)
 * ```
 *
 * The child pid messages let the main thread kill a tool's process tree when
 * it has to terminate a worker that overran its timeout: terminating a worker
 * thread does not stop the processes it spawned.
 *
 * All payloads cross the thread boundary by structured cloning, so they hold
 * plain data only.
 *
 * @module WorkerMessageInterface
 */

import { InvocationTask } from '../../shared/interfaces/job-invocation.interface';
import {
  InvocationFailure,
  MediaArtifact,
} from '../../shared/interfaces/invocation-result.interface';

export enum WorkerMessageType {
  RUN_INVOCATION = 'RUN_INVOCATION',
  INVOCATION_COMPLETED = 'INVOCATION_COMPLETED',
  INVOCATION_FAILED = 'INVOCATION_FAILED',
  CHILD_SPAWNED = 'CHILD_SPAWNED',
  CHILD_EXITED = 'CHILD_EXITED',
  SHUTDOWN = 'SHUTDOWN',
  HEALTH_CHECK = 'HEALTH_CHECK',
  HEALTH_RESPONSE = 'HEALTH_RESPONSE',
}

/**
 * Generic message wrapper for all worker thread communication.
 *
 * @property timestamp - Unix timestamp (ms) when the message was created
 */
export interface WorkerMessage<T = unknown> {
  type: WorkerMessageType;
  payload: T;
  timestamp: number;
}

/**
 * `workerData` of every worker thread.
 */
export interface WorkerBootstrapData {
  workerId: number;
  logLevel: string;
  nodeEnv: string;
}

/**
 * Settings a worker needs to run tools. Sent with every RUN_INVOCATION so a
 * restarted worker needs no separate configuration step.
 */
export interface WorkerConfig {
  tempDir: string;
  ytDlpPath: string;
  ffmpegPath: string;
}

export interface RunInvocationPayload {
  task: InvocationTask;
  config: WorkerConfig;
}

export interface InvocationCompletedPayload {
  invocationId: string;
  artifact: MediaArtifact;
  processingTimeMs: number;
}

export interface InvocationFailedPayload {
  invocationId: string;
  error: InvocationFailure;
  processingTimeMs: number;
}

export interface ChildProcessPayload {
  invocationId: string;
  pid: number;
}

export interface HealthResponsePayload {
  workerId: number;
  memoryUsage: NodeJS.MemoryUsage;
  uptime: number;
}

/**
 * Messages a worker sends, discriminated on `type` so the pool can switch on
 * it without casting the payload.
 */
export type WorkerOutboundMessage =
  | (WorkerMessage<InvocationCompletedPayload> & { type: WorkerMessageType.INVOCATION_COMPLETED })
  | (WorkerMessage<InvocationFailedPayload> & { type: WorkerMessageType.INVOCATION_FAILED })
  | (WorkerMessage<ChildProcessPayload> & {
      type: WorkerMessageType.CHILD_SPAWNED | WorkerMessageType.CHILD_EXITED;
    })
  | (WorkerMessage<HealthResponsePayload> & { type: WorkerMessageType.HEALTH_RESPONSE });

/**
 * Messages the pool sends to a worker.
 */
export type WorkerInboundMessage =
  | (WorkerMessage<RunInvocationPayload> & { type: WorkerMessageType.RUN_INVOCATION })
  | (WorkerMessage<null> & {
      type: WorkerMessageType.HEALTH_CHECK | WorkerMessageType.SHUTDOWN;
    });
