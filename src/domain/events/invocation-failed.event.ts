import { DomainEvent } from './base.event';
import { InvocationKind } from '../../shared/interfaces/job-invocation.interface';
import { InvocationErrorCode } from '../../shared/interfaces/invocation-result.interface';

/**
 * Invocation Failed Event
 * Emitted when a tool run ends without an artifact, whatever the cause
 */
export interface InvocationFailedEventPayload {
  invocationId: string;
  correlationId?: string;
  kind: InvocationKind;
  code: InvocationErrorCode;
  errorMessage: string;
  processingTimeMs: number;
}

export class InvocationFailedEvent extends DomainEvent {
  constructor(public readonly payload: InvocationFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'invocation.failed';
  }

  get invocationId(): string {
    return this.payload.invocationId;
  }

  get code(): InvocationErrorCode {
    return this.payload.code;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
