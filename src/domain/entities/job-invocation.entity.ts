import { produce } from 'immer';
import { MediaJob } from '../../shared/interfaces/job-invocation.interface';
import {
  InvocationFailure,
  MediaArtifact,
} from '../../shared/interfaces/invocation-result.interface';

/**
 * Job Invocation Entity
 * One tool run requested over HTTP, from submission to its artifact or
 * failure. Lives for a single request/response cycle; never persisted.
 *
 * Same shape as the other entities here: plain readonly data, pure functions
 * in a namespace, Immer for the copies.
 */

export enum InvocationStatus {
  PENDING = 'PENDING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
}

export type JobInvocationEntityData = MediaJob & {
  readonly invocationId: string;
  readonly correlationId?: string;
  readonly status: InvocationStatus;
  readonly createdAt: Date;
  readonly finishedAt?: Date;
  readonly processingTimeMs?: number;
  readonly artifact?: MediaArtifact;
  readonly failure?: InvocationFailure;
};

export type JobInvocationEntity = JobInvocationEntityData & {
  isTerminal(): boolean;
  succeed(artifact: MediaArtifact, processingTimeMs: number): JobInvocationEntity;
  fail(failure: InvocationFailure, processingTimeMs: number): JobInvocationEntity;
  toJSON(): ReturnType<typeof JobInvocationEntity.toJSON>;
};

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace JobInvocationEntity {
  export type CreateProps = MediaJob & {
    invocationId: string;
    correlationId?: string;
    createdAt?: Date;
  };

  export function create(props: CreateProps): JobInvocationEntity {
    validate(props);

    const common = {
      invocationId: props.invocationId,
      correlationId: props.correlationId,
      status: InvocationStatus.PENDING,
      createdAt: props.createdAt ?? new Date(),
    };

    const data: JobInvocationEntityData =
      props.kind === 'fetch'
        ? { ...common, kind: 'fetch', request: { ...props.request } }
        : { ...common, kind: 'transcode', request: { ...props.request } };

    return attachMethods(data);
  }

  function attachMethods(data: JobInvocationEntityData): JobInvocationEntity {
    return {
      ...data,
      isTerminal: () => isTerminal(data),
      succeed: (artifact: MediaArtifact, processingTimeMs: number) =>
        succeed(data, artifact, processingTimeMs),
      fail: (failure: InvocationFailure, processingTimeMs: number) =>
        fail(data, failure, processingTimeMs),
      toJSON: () => toJSON(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.invocationId || props.invocationId.trim().length === 0) {
      throw new Error('Invocation ID is required');
    }
    if (!props.request.url || props.request.url.trim().length === 0) {
      throw new Error('Source URL is required');
    }
  }

  export function isTerminal(invocation: JobInvocationEntityData): boolean {
    return invocation.status !== InvocationStatus.PENDING;
  }

  function assertPending(invocation: JobInvocationEntityData): void {
    if (isTerminal(invocation)) {
      throw new Error(
        `Invocation ${invocation.invocationId} is already ${invocation.status}`,
      );
    }
  }

  export function succeed(
    invocation: JobInvocationEntityData,
    artifact: MediaArtifact,
    processingTimeMs: number,
  ): JobInvocationEntity {
    assertPending(invocation);

    const updated = produce(invocation, (draft) => {
      draft.status = InvocationStatus.SUCCEEDED;
      draft.finishedAt = new Date();
      draft.processingTimeMs = processingTimeMs;
      draft.artifact = { ...artifact };
    });
    return attachMethods(updated);
  }

  export function fail(
    invocation: JobInvocationEntityData,
    failure: InvocationFailure,
    processingTimeMs: number,
  ): JobInvocationEntity {
    assertPending(invocation);

    const updated = produce(invocation, (draft) => {
      draft.status = InvocationStatus.FAILED;
      draft.finishedAt = new Date();
      draft.processingTimeMs = processingTimeMs;
      draft.failure = { ...failure };
    });
    return attachMethods(updated);
  }

  export function toJSON(invocation: JobInvocationEntityData) {
    return {
      invocationId: invocation.invocationId,
      correlationId: invocation.correlationId,
      kind: invocation.kind,
      request: invocation.request,
      status: invocation.status,
      createdAt: invocation.createdAt.toISOString(),
      finishedAt: invocation.finishedAt?.toISOString(),
      processingTimeMs: invocation.processingTimeMs,
      artifact: invocation.artifact,
      failure: invocation.failure,
    };
  }
}
