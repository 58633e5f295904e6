import { DomainEvent } from './base.event';
import { InvocationKind } from '../../shared/interfaces/job-invocation.interface';

/**
 * Invocation Completed Event
 * Emitted when a tool run produced its artifact
 */
export interface InvocationCompletedEventPayload {
  invocationId: string;
  correlationId?: string;
  kind: InvocationKind;
  format: string;
  sizeBytes: number;
  processingTimeMs: number;
}

export class InvocationCompletedEvent extends DomainEvent {
  constructor(public readonly payload: InvocationCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'invocation.completed';
  }

  get invocationId(): string {
    return this.payload.invocationId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
