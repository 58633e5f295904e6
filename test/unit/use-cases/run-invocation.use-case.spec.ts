import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HttpStatus } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RunInvocationUseCase } from '../../../src/application/use-cases/run-invocation.use-case';
import { RunInvocationCommand } from '../../../src/application/ports/input/run-invocation.port';
import { InvocationCompletedEvent } from '../../../src/domain/events/invocation-completed.event';
import { InvocationFailedEvent } from '../../../src/domain/events/invocation-failed.event';
import { InvocationErrorCode } from '../../../src/shared/interfaces/invocation-result.interface';
import { InvocationFailedException } from '../../../src/shared/exceptions/invocation-failed.exception';
import {
  createMockEventPublisher,
  createMockWorkerPool,
  createTestConfig,
  createTestLogger,
} from '../helpers/mock-factories';

/**
 * RunInvocationUseCase Tests
 * The worker pool and event publisher are mocks; partial artifacts live in a
 * real temporary directory.
 */
describe('RunInvocationUseCase', () => {
  let tempDir: string;
  let workerPool: ReturnType<typeof createMockWorkerPool>;
  let eventPublisher: ReturnType<typeof createMockEventPublisher>;
  let useCase: RunInvocationUseCase;

  const command: RunInvocationCommand = {
    kind: 'fetch',
    request: { url: 'https://media.example.test/watch?v=abc', format: 'mp4' },
    correlationId: 'corr-1',
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-invocation-'));
    workerPool = createMockWorkerPool();
    eventPublisher = createMockEventPublisher();
    useCase = new RunInvocationUseCase(
      workerPool,
      eventPublisher,
      createTestConfig({ TEMP_DIR: tempDir }),
      createTestLogger(),
    );
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should submit a plain task and return the artifact', async () => {
    const artifact = {
      path: path.join(tempDir, 'out.mp4'),
      sizeBytes: 2048,
      format: 'mp4',
      contentType: 'video/mp4',
    };
    workerPool.submit.mockImplementation(async (task) => ({
      success: true,
      artifact,
      invocationId: task.invocationId,
      processingTimeMs: 120,
    }));

    const result = await useCase.execute(command);

    const [task] = workerPool.submit.mock.calls[0];
    expect(task).toEqual({
      kind: 'fetch',
      request: { url: 'https://media.example.test/watch?v=abc', format: 'mp4' },
      invocationId: result.invocationId,
      correlationId: 'corr-1',
      submittedAt: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
    });
    expect(result).toEqual({
      invocationId: task.invocationId,
      artifact,
      processingTimeMs: 120,
    });
  });

  it('should publish invocation.completed on success', async () => {
    workerPool.submit.mockImplementation(async (task) => ({
      success: true,
      artifact: { path: '/tmp/x.mp3', sizeBytes: 10, format: 'mp3', contentType: 'audio/mpeg' },
      invocationId: task.invocationId,
      processingTimeMs: 30,
    }));

    const result = await useCase.execute(command);

    const [event] = eventPublisher.publishAsync.mock.calls[0];
    expect(event).toBeInstanceOf(InvocationCompletedEvent);
    expect(event.eventName).toBe('invocation.completed');
    expect(event.toJSON().payload).toEqual({
      invocationId: result.invocationId,
      correlationId: 'corr-1',
      kind: 'fetch',
      format: 'mp3',
      sizeBytes: 10,
      processingTimeMs: 30,
    });
  });

  it('should give every invocation its own id', async () => {
    workerPool.submit.mockImplementation(async (task) => ({
      success: true,
      artifact: { path: '/tmp/x.mp4', sizeBytes: 1, format: 'mp4', contentType: 'video/mp4' },
      invocationId: task.invocationId,
      processingTimeMs: 1,
    }));

    const first = await useCase.execute(command);
    const second = await useCase.execute(command);

    expect(first.invocationId).not.toBe(second.invocationId);
  });

  it('should throw InvocationFailedException with the mapped status on failure', async () => {
    workerPool.submit.mockImplementation(async (task) => ({
      success: false,
      error: { code: InvocationErrorCode.TIMEOUT, message: 'Invocation exceeded the 600s timeout' },
      invocationId: task.invocationId,
      processingTimeMs: 600000,
    }));

    const error = await useCase.execute(command).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvocationFailedException);
    if (error instanceof InvocationFailedException) {
      expect(error.getStatus()).toBe(HttpStatus.GATEWAY_TIMEOUT);
      expect(error.getResponse()).toEqual({
        success: false,
        error: 'Invocation exceeded the 600s timeout',
        code: InvocationErrorCode.TIMEOUT,
        invocationId: error.invocationId,
      });
    }
  });

  it('should remove partial artifacts of a failed invocation', async () => {
    await fs.writeFile(path.join(tempDir, 'someone-else.mp4'), 'keep');
    workerPool.submit.mockImplementation(async (task) => {
      await fs.writeFile(path.join(tempDir, `${task.invocationId}.f137.mp4.part`), 'partial');
      return {
        success: false,
        error: {
          code: InvocationErrorCode.WORKER_CRASHED,
          message: 'Worker 1 exited with code 1',
        },
        invocationId: task.invocationId,
        processingTimeMs: 50,
      };
    });

    await expect(useCase.execute(command)).rejects.toBeInstanceOf(InvocationFailedException);

    expect(await fs.readdir(tempDir)).toEqual(['someone-else.mp4']);
  });

  it('should publish invocation.failed with the failure code', async () => {
    workerPool.submit.mockImplementation(async (task) => ({
      success: false,
      error: {
        code: InvocationErrorCode.POOL_UNAVAILABLE,
        message: 'All workers are busy and the queue is full',
      },
      invocationId: task.invocationId,
      processingTimeMs: 0,
    }));

    const error = await useCase.execute(command).catch((e: unknown) => e);

    const [event] = eventPublisher.publishAsync.mock.calls[0];
    expect(event).toBeInstanceOf(InvocationFailedEvent);
    expect(event.toJSON()).toMatchObject({
      eventName: 'invocation.failed',
      payload: {
        correlationId: 'corr-1',
        kind: 'fetch',
        code: InvocationErrorCode.POOL_UNAVAILABLE,
        errorMessage: 'All workers are busy and the queue is full',
        processingTimeMs: 0,
      },
    });
    expect(error instanceof InvocationFailedException && error.getStatus()).toBe(
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  });

  it('should reject an invalid command before submitting it', async () => {
    await expect(
      useCase.execute({ kind: 'fetch', request: { url: ' ', format: 'best' } }),
    ).rejects.toThrow('Source URL is required');
    expect(workerPool.submit).not.toHaveBeenCalled();
  });
});
