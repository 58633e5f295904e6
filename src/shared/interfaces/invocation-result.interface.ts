export enum InvocationErrorCode {
  TIMEOUT = 'TIMEOUT',
  TOOL_FAILED = 'TOOL_FAILED',
  TOOL_UNAVAILABLE = 'TOOL_UNAVAILABLE',
  WORKER_CRASHED = 'WORKER_CRASHED',
  CANCELLED = 'CANCELLED',
  POOL_UNAVAILABLE = 'POOL_UNAVAILABLE',
  UNKNOWN = 'UNKNOWN',
}

export interface MediaArtifact {
  path: string;
  sizeBytes: number;
  format: string;
  contentType: string;
}

export interface InvocationFailure {
  code: InvocationErrorCode;
  message: string;
  exitCode?: number | null;
  signal?: string | null;
  /** Last lines the tool wrote to stderr */
  stderr?: string;
}

/**
 * Outcome of a single tool run; failures are values, not exceptions.
 */
export type ToolOutcome =
  | { success: true; artifact: MediaArtifact }
  | { success: false; error: InvocationFailure };

export type InvocationResult = ToolOutcome & {
  invocationId: string;
  processingTimeMs: number;
};
