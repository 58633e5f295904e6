import { Logger } from 'pino';
import {
  WorkerMessage,
  WorkerMessageType,
  WorkerInboundMessage,
  WorkerConfig,
  RunInvocationPayload,
  InvocationCompletedPayload,
  InvocationFailedPayload,
  ChildProcessPayload,
  HealthResponsePayload,
} from '../interfaces/worker-message.interface';
import { ExternalToolRunnerPort } from '../../application/ports/output/external-tool-runner.port';
import { InvocationErrorCode } from '../../shared/interfaces/invocation-result.interface';
import {
  ProcessToolRunner,
  ToolProcessHooks,
} from '../../infrastructure/adapters/tools/process-tool-runner.adapter';
import { processInvocation } from './invocation-processor';

/**
 * The side of the channel back to the pool (`parentPort` in a worker).
 */
export interface WorkerPort {
  postMessage(message: WorkerMessage): void;
}

export type CreateToolRunner = (
  config: WorkerConfig,
  hooks: ToolProcessHooks,
) => ExternalToolRunnerPort;

export interface WorkerMessageHandlerOptions {
  workerId: number;
  port: WorkerPort;
  logger: Logger;
  exit: (code: number) => void;
  createRunner?: CreateToolRunner;
}

interface RunningInvocation {
  invocationId: string;
  controller: AbortController;
  done: Promise<void>;
}

const createProcessToolRunner: CreateToolRunner = (config, hooks) =>
  new ProcessToolRunner({ ...config, hooks });

/**
 * Everything a worker thread does with the messages it receives. At most one
 * invocation runs at a time.
 */
export class WorkerMessageHandler {
  private running?: RunningInvocation;
  private readonly createRunner: CreateToolRunner;

  constructor(private readonly options: WorkerMessageHandlerOptions) {
    this.createRunner = options.createRunner ?? createProcessToolRunner;
  }

  handle(message: WorkerInboundMessage): void {
    switch (message.type) {
      case WorkerMessageType.RUN_INVOCATION:
        this.handleRunInvocation(message.payload);
        break;

      case WorkerMessageType.HEALTH_CHECK:
        this.handleHealthCheck();
        break;

      case WorkerMessageType.SHUTDOWN:
        this.handleShutdown().catch((error: unknown) => {
          this.options.logger.error({ error }, 'Shutdown failed');
          this.options.exit(1);
        });
        break;

      default:
        this.options.logger.warn({ message }, 'Unknown message type');
    }
  }

  private send<T>(type: WorkerMessageType, payload: T): void {
    const message: WorkerMessage<T> = {
      type,
      payload,
      timestamp: Date.now(),
    };
    this.options.port.postMessage(message);
  }

  private handleRunInvocation(payload: RunInvocationPayload): void {
    if (this.running) {
      // the pool never double-books a worker; refuse rather than run two tools
      this.send<InvocationFailedPayload>(WorkerMessageType.INVOCATION_FAILED, {
        invocationId: payload.task.invocationId,
        error: {
          code: InvocationErrorCode.UNKNOWN,
          message: `Worker ${this.options.workerId} is busy with ${this.running.invocationId}`,
        },
        processingTimeMs: 0,
      });
      return;
    }

    const controller = new AbortController();
    const current: RunningInvocation = {
      invocationId: payload.task.invocationId,
      controller,
      done: this.runInvocation(payload, controller.signal)
        .catch((error: unknown) => {
          this.options.logger.fatal({ error }, 'Invocation could not be reported');
          this.options.exit(1);
        })
        .finally(() => {
          if (this.running === current) this.running = undefined;
        }),
    };
    this.running = current;
  }

  private async runInvocation(payload: RunInvocationPayload, signal: AbortSignal): Promise<void> {
    const startTime = Date.now();
    const { task, config } = payload;
    const logger = this.options.logger.child({
      invocationId: task.invocationId,
      correlationId: task.correlationId,
    });

    const runner = this.createRunner(config, {
      onSpawn: (pid) => {
        logger.debug({ pid }, 'Tool process started');
        this.send<ChildProcessPayload>(WorkerMessageType.CHILD_SPAWNED, {
          invocationId: task.invocationId,
          pid,
        });
      },
      onExit: (pid) => {
        this.send<ChildProcessPayload>(WorkerMessageType.CHILD_EXITED, {
          invocationId: task.invocationId,
          pid,
        });
      },
    });

    logger.info({ kind: task.kind, url: task.request.url }, 'Invocation started');

    const outcome = await processInvocation(task, runner, signal);
    const processingTimeMs = Date.now() - startTime;

    if (outcome.success) {
      logger.info(
        { processingTimeMs, sizeBytes: outcome.artifact.sizeBytes },
        'Invocation completed',
      );
      this.send<InvocationCompletedPayload>(WorkerMessageType.INVOCATION_COMPLETED, {
        invocationId: task.invocationId,
        artifact: outcome.artifact,
        processingTimeMs,
      });
      return;
    }

    logger.warn(
      { processingTimeMs, code: outcome.error.code, error: outcome.error.message },
      'Invocation failed',
    );
    this.send<InvocationFailedPayload>(WorkerMessageType.INVOCATION_FAILED, {
      invocationId: task.invocationId,
      error: outcome.error,
      processingTimeMs,
    });
  }

  /**
   * Abort the running tool, wait until its CANCELLED result has been sent,
   * then exit cleanly.
   */
  private async handleShutdown(): Promise<void> {
    const running = this.running;
    if (running) {
      this.options.logger.info(
        { invocationId: running.invocationId },
        'Shutdown requested, cancelling invocation',
      );
      running.controller.abort();
      await running.done;
    }
    this.options.exit(0);
  }

  private handleHealthCheck(): void {
    this.send<HealthResponsePayload>(WorkerMessageType.HEALTH_RESPONSE, {
      workerId: this.options.workerId,
      memoryUsage: process.memoryUsage(),
      uptime: process.uptime(),
    });
  }
}
