import { ExternalToolRunnerPort } from '../../application/ports/output/external-tool-runner.port';
import { InvocationTask } from '../../shared/interfaces/job-invocation.interface';
import {
  InvocationErrorCode,
  ToolOutcome,
} from '../../shared/interfaces/invocation-result.interface';

/**
 * Route a task to the matching tool. Anything the runner throws instead of
 * returning is reported as an `UNKNOWN` failure, so the worker always has a
 * result to send back.
 */
export async function processInvocation(
  task: InvocationTask,
  runner: ExternalToolRunnerPort,
  signal: AbortSignal,
): Promise<ToolOutcome> {
  try {
    switch (task.kind) {
      case 'fetch':
        return await runner.fetchMedia(task.invocationId, task.request, signal);
      case 'transcode':
        return await runner.transcodeMedia(task.invocationId, task.request, signal);
    }
  } catch (error) {
    return {
      success: false,
      error: {
        code: InvocationErrorCode.UNKNOWN,
        message: error instanceof Error ? error.message : String(error),
      },
    };
  }
}
