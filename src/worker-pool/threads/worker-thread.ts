/**
 * Worker Thread Entry Point
 *
 * Runs in its own Worker Thread, one per pool slot. A worker handles a single
 * invocation at a time: it starts the tool (yt-dlp or ffmpeg) as a child
 * process through {@link WorkerMessageHandler} and reports the outcome to the
 * main thread.
 *
 * ### Lifecycle:
 * 1. Spawned by PoolManagerService with `{ workerId, logLevel, nodeEnv }` as
 *    `workerData`
 * 2. Idle until a RUN_INVOCATION message arrives
 * 3. Forwards every child pid (CHILD_SPAWNED / CHILD_EXITED) so the pool can
 *    kill the tool if this thread gets terminated on timeout
 * 4. Sends INVOCATION_COMPLETED or INVOCATION_FAILED and goes back to idle
 * 5. On SHUTDOWN aborts the running invocation (reported as CANCELLED) and
 *    exits with code 0
 *
 * ### Error Handling:
 * - Tool failures come back from the runner as values and are reported as
 *   INVOCATION_FAILED
 * - Uncaught exceptions and unhandled rejections are logged and the worker
 *   exits with code 1; the pool fails the in-flight invocation with
 *   WORKER_CRASHED and starts a replacement
 *
 * @module WorkerThread
 */

import { parentPort, workerData } from 'worker_threads';
import pino from 'pino';
import { WorkerInboundMessage } from '../interfaces/worker-message.interface';
import { buildPinoOptions } from '../../shared/logging/pino-options';
import { WorkerMessageHandler } from './worker-message-handler';

const workerId: number = typeof workerData?.workerId === 'number' ? workerData.workerId : 0;
const logLevel: string = typeof workerData?.logLevel === 'string' ? workerData.logLevel : 'info';
const nodeEnv: string = typeof workerData?.nodeEnv === 'string' ? workerData.nodeEnv : 'production';

const logger = pino(buildPinoOptions(logLevel, nodeEnv, { workerId }));

const exit = (code: number): void => {
  logger.flush();
  process.exit(code);
};

const port = parentPort;
if (port) {
  const handler = new WorkerMessageHandler({ workerId, port, logger, exit });
  port.on('message', (message: WorkerInboundMessage) => handler.handle(message));
}

process.on('uncaughtException', (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception in worker thread');
  exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection in worker thread');
  exit(1);
});

logger.info('Worker started');
