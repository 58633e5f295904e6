import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../../config/configuration';
import {
  RunInvocationCommand,
  RunInvocationPort,
  RunInvocationResult,
} from '../ports/input/run-invocation.port';
import { WorkerPoolPort } from '../ports/output/worker-pool.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  EVENT_PUBLISHER_PORT,
  WORKER_POOL_PORT,
} from '../../infrastructure/infrastructure.module';
import {
  JobInvocationEntity,
  JobInvocationEntityData,
} from '../../domain/entities/job-invocation.entity';
import { InvocationCompletedEvent } from '../../domain/events/invocation-completed.event';
import { InvocationFailedEvent } from '../../domain/events/invocation-failed.event';
import { InvocationTask } from '../../shared/interfaces/job-invocation.interface';
import { InvocationFailedException } from '../../shared/exceptions/invocation-failed.exception';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { removeInvocationArtifacts } from '../../shared/process/temp-artifacts';

/**
 * Run Invocation Use Case
 * Submits one fetch or transcode to the worker pool and waits for it.
 *
 * Failures of any kind (tool, timeout, crashed worker, full pool) leave no
 * files behind and surface as InvocationFailedException.
 */
@Injectable()
export class RunInvocationUseCase implements RunInvocationPort {
  private readonly tempDir: string;

  constructor(
    @Inject(WORKER_POOL_PORT) private readonly workerPool: WorkerPoolPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    this.tempDir = this.configService.getOrThrow('tools', { infer: true }).tempDir;
    this.logger.setContext(RunInvocationUseCase.name);
  }

  async execute(command: RunInvocationCommand): Promise<RunInvocationResult> {
    const invocation = JobInvocationEntity.create({ ...command, invocationId: uuidv4() });
    const { invocationId, correlationId, kind } = invocation;
    const log = this.logger.forInvocation(invocationId, correlationId);

    log.info({ kind, url: invocation.request.url }, 'Invocation accepted');

    const result = await this.workerPool.submit(this.toTask(invocation));

    if (result.success) {
      const succeeded = invocation.succeed(result.artifact, result.processingTimeMs);
      log.info(
        {
          status: succeeded.status,
          processingTimeMs: result.processingTimeMs,
          sizeBytes: result.artifact.sizeBytes,
        },
        'Invocation succeeded',
      );

      this.eventPublisher.publishAsync(
        new InvocationCompletedEvent({
          invocationId,
          correlationId,
          kind,
          format: result.artifact.format,
          sizeBytes: result.artifact.sizeBytes,
          processingTimeMs: result.processingTimeMs,
        }),
      );

      return {
        invocationId,
        artifact: result.artifact,
        processingTimeMs: result.processingTimeMs,
      };
    }

    const failed = invocation.fail(result.error, result.processingTimeMs);
    log.warn(
      {
        status: failed.status,
        code: result.error.code,
        error: result.error.message,
        exitCode: result.error.exitCode,
        stderr: result.error.stderr,
        processingTimeMs: result.processingTimeMs,
      },
      'Invocation failed',
    );

    await this.discardArtifacts(invocationId, log);

    this.eventPublisher.publishAsync(
      new InvocationFailedEvent({
        invocationId,
        correlationId,
        kind,
        code: result.error.code,
        errorMessage: result.error.message,
        processingTimeMs: result.processingTimeMs,
      }),
    );

    throw new InvocationFailedException(invocationId, result.error);
  }

  /**
   * Plain data only: the task is structured-cloned into a worker thread.
   */
  private toTask(invocation: JobInvocationEntityData): InvocationTask {
    const base = {
      invocationId: invocation.invocationId,
      correlationId: invocation.correlationId,
      submittedAt: invocation.createdAt.toISOString(),
    };

    return invocation.kind === 'fetch'
      ? { ...base, kind: 'fetch', request: { ...invocation.request } }
      : { ...base, kind: 'transcode', request: { ...invocation.request } };
  }

  private async discardArtifacts(invocationId: string, log: PinoLoggerService): Promise<void> {
    try {
      const removed = await removeInvocationArtifacts(this.tempDir, invocationId);
      if (removed.length > 0) {
        log.debug({ removed }, 'Removed partial artifacts');
      }
    } catch (error) {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to remove partial artifacts',
      );
    }
  }
}
