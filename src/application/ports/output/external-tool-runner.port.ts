import {
  FetchMediaRequest,
  TranscodeMediaRequest,
} from '../../../shared/interfaces/job-invocation.interface';
import { ToolOutcome } from '../../../shared/interfaces/invocation-result.interface';

/**
 * First line of each tool's version banner, `null` when the tool cannot be
 * started.
 */
export interface ToolVersions {
  ytDlp: string | null;
  ffmpeg: string | null;
}

/**
 * External Tool Runner Port (Driven Port)
 * Runs the downloader and the transcoder as child processes.
 *
 * Both operations resolve a {@link ToolOutcome}; they never reject for a tool
 * failure. Aborting `signal` kills the tool's whole process tree and resolves
 * a `CANCELLED` failure. Output files are named after `invocationId`.
 */
export interface ExternalToolRunnerPort {
  fetchMedia(
    invocationId: string,
    request: FetchMediaRequest,
    signal: AbortSignal,
  ): Promise<ToolOutcome>;

  transcodeMedia(
    invocationId: string,
    request: TranscodeMediaRequest,
    signal: AbortSignal,
  ): Promise<ToolOutcome>;

  probeVersions(): Promise<ToolVersions>;
}
