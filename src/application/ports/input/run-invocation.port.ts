import { MediaJob } from '../../../shared/interfaces/job-invocation.interface';
import { MediaArtifact } from '../../../shared/interfaces/invocation-result.interface';

/**
 * Run Invocation Command
 */
export type RunInvocationCommand = MediaJob & {
  correlationId?: string;
};

/**
 * Run Invocation Result
 * Only successful runs come back; failures are thrown as
 * InvocationFailedException.
 */
export interface RunInvocationResult {
  invocationId: string;
  artifact: MediaArtifact;
  processingTimeMs: number;
}

/**
 * Run Invocation Port (Driving Port / Use Case Interface)
 * Runs one tool invocation on the worker pool and waits for its artifact
 */
export interface RunInvocationPort {
  execute(command: RunInvocationCommand): Promise<RunInvocationResult>;
}
