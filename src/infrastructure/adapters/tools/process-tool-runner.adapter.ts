import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import {
  ExternalToolRunnerPort,
  ToolVersions,
} from '../../../application/ports/output/external-tool-runner.port';
import {
  FetchMediaRequest,
  TranscodeMediaRequest,
} from '../../../shared/interfaces/job-invocation.interface';
import {
  InvocationErrorCode,
  InvocationFailure,
  ToolOutcome,
} from '../../../shared/interfaces/invocation-result.interface';
import {
  contentTypeFor,
  extensionForMimeType,
  formatOfPath,
} from '../../../domain/value-objects/media-format.vo';
import { killProcessTree } from '../../../shared/process/kill-process-tree';
import { removeInvocationArtifacts } from '../../../shared/process/temp-artifacts';
import { buildFetchArgs, buildTranscodeArgs, buildVersionArgs } from './tool-commands';

/**
 * The part of `ChildProcess` the runner relies on.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
}

export type SpawnProcess = (command: string, args: string[]) => SpawnedProcess;

/**
 * Notified for every tool process, so a worker can tell the pool which pids
 * to kill if the worker itself has to be terminated.
 */
export interface ToolProcessHooks {
  onSpawn?(pid: number): void;
  onExit?(pid: number): void;
}

export interface ProcessToolRunnerOptions {
  tempDir: string;
  ytDlpPath: string;
  ffmpegPath: string;
  hooks?: ToolProcessHooks;
  spawnProcess?: SpawnProcess;
  killTree?: (pid: number) => Promise<void>;
}

type ProcessRun =
  | { success: true; stdout: string; stderr: string }
  | { success: false; error: InvocationFailure };

const STDOUT_TAIL_CHARS = 64 * 1024;
const STDERR_TAIL_CHARS = 4 * 1024;
const VERSION_PROBE_TIMEOUT_MS = 10_000;

const DATA_URL_PATTERN = /^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s;

const defaultSpawn: SpawnProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

function appendTail(current: string, chunk: Buffer | string, limit: number): string {
  const next = current + chunk.toString();
  return next.length > limit ? next.slice(next.length - limit) : next;
}

function lastNonEmptyLine(output: string): string | undefined {
  const lines = output.split(/\r?\n/).map((line) => line.trim());
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].length > 0) return lines[i];
  }
  return undefined;
}

function failure(code: InvocationErrorCode, message: string): { success: false; error: InvocationFailure } {
  return { success: false, error: { code, message } };
}

/**
 * Runs yt-dlp and ffmpeg as child processes and turns their exits into
 * {@link ToolOutcome} values.
 */
export class ProcessToolRunner implements ExternalToolRunnerPort {
  private readonly spawnProcess: SpawnProcess;
  private readonly killTree: (pid: number) => Promise<void>;

  constructor(private readonly options: ProcessToolRunnerOptions) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.killTree = options.killTree ?? ((pid) => killProcessTree(pid));
  }

  async fetchMedia(
    invocationId: string,
    request: FetchMediaRequest,
    signal: AbortSignal,
  ): Promise<ToolOutcome> {
    await fs.mkdir(this.options.tempDir, { recursive: true });

    if (request.url.startsWith('data:')) {
      return this.writeDataUrl(invocationId, request, signal);
    }

    const outputTemplate = path.join(this.options.tempDir, `${invocationId}.%(ext)s`);
    const run = await this.runTool(
      this.options.ytDlpPath,
      buildFetchArgs(request, outputTemplate, this.options.ffmpegPath),
      signal,
    );

    if (!run.success) {
      return this.discard(invocationId, run.error);
    }

    const reportedPath = lastNonEmptyLine(run.stdout);
    if (!reportedPath) {
      return this.discard(invocationId, {
        code: InvocationErrorCode.TOOL_FAILED,
        message: 'yt-dlp finished without reporting an output file',
        stderr: run.stderr.trim() || undefined,
      });
    }

    return this.toArtifact(invocationId, reportedPath);
  }

  async transcodeMedia(
    invocationId: string,
    request: TranscodeMediaRequest,
    signal: AbortSignal,
  ): Promise<ToolOutcome> {
    await fs.mkdir(this.options.tempDir, { recursive: true });

    const outputPath = path.join(this.options.tempDir, `${invocationId}.${request.format}`);
    const run = await this.runTool(
      this.options.ffmpegPath,
      buildTranscodeArgs(request, outputPath),
      signal,
    );

    if (!run.success) {
      return this.discard(invocationId, run.error);
    }

    return this.toArtifact(invocationId, outputPath);
  }

  async probeVersions(): Promise<ToolVersions> {
    const [ytDlp, ffmpeg] = await Promise.all([
      this.probe(this.options.ytDlpPath, buildVersionArgs('yt-dlp')),
      this.probe(this.options.ffmpegPath, buildVersionArgs('ffmpeg')),
    ]);
    return { ytDlp, ffmpeg };
  }

  private async probe(binary: string, args: string[]): Promise<string | null> {
    const run = await this.runTool(binary, args, AbortSignal.timeout(VERSION_PROBE_TIMEOUT_MS));
    if (!run.success) return null;
    return run.stdout.split(/\r?\n/)[0].trim() || null;
  }

  /**
   * Upstream automations send generated audio inline as base64 data: URLs;
   * those are written out directly instead of going through yt-dlp.
   */
  private async writeDataUrl(
    invocationId: string,
    request: FetchMediaRequest,
    signal: AbortSignal,
  ): Promise<ToolOutcome> {
    const match = DATA_URL_PATTERN.exec(request.url);
    if (!match) {
      return failure(InvocationErrorCode.TOOL_FAILED, 'Malformed data URL');
    }

    const [, mimeType, parameters, payload] = match;
    const isBase64 = parameters.split(';').includes('base64');

    let bytes: Buffer;
    try {
      bytes = isBase64 ? Buffer.from(payload, 'base64') : Buffer.from(decodeURIComponent(payload));
    } catch (error) {
      return failure(
        InvocationErrorCode.TOOL_FAILED,
        `Malformed data URL: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (bytes.length === 0) {
      return failure(InvocationErrorCode.TOOL_FAILED, 'data URL has an empty payload');
    }
    if (signal.aborted) {
      return failure(InvocationErrorCode.CANCELLED, 'Invocation was cancelled');
    }

    // the bytes are written as they are, so the format has to be the payload's own
    const payloadExtension = extensionForMimeType(mimeType);
    if (request.format !== 'best' && request.format !== payloadExtension) {
      return failure(
        InvocationErrorCode.TOOL_FAILED,
        `data URL holds ${mimeType || 'text/plain'}, which cannot be returned as ${request.format}`,
      );
    }

    const extension = payloadExtension ?? 'bin';
    const outputPath = path.join(this.options.tempDir, `${invocationId}.${extension}`);
    await fs.writeFile(outputPath, bytes);

    return this.toArtifact(invocationId, outputPath);
  }

  private async toArtifact(invocationId: string, filePath: string): Promise<ToolOutcome> {
    let sizeBytes: number;
    try {
      sizeBytes = (await fs.stat(filePath)).size;
    } catch (error) {
      return this.discard(invocationId, {
        code: InvocationErrorCode.TOOL_FAILED,
        message: `Output file is missing: ${error instanceof Error ? error.message : String(error)}`,
      });
    }

    if (sizeBytes === 0) {
      return this.discard(invocationId, {
        code: InvocationErrorCode.TOOL_FAILED,
        message: 'Tool produced an empty output file',
      });
    }

    const format = formatOfPath(filePath);
    return {
      success: true,
      artifact: { path: filePath, sizeBytes, format, contentType: contentTypeFor(format) },
    };
  }

  private async discard(invocationId: string, error: InvocationFailure): Promise<ToolOutcome> {
    await removeInvocationArtifacts(this.options.tempDir, invocationId);
    return { success: false, error };
  }

  /**
   * Spawn one tool process and wait for it to close. Never rejects.
   */
  private runTool(binary: string, args: string[], signal: AbortSignal): Promise<ProcessRun> {
    const toolName = path.basename(binary);

    return new Promise<ProcessRun>((resolve) => {
      if (signal.aborted) {
        resolve(failure(InvocationErrorCode.CANCELLED, `${toolName} was cancelled before it started`));
        return;
      }

      let child: SpawnedProcess;
      try {
        child = this.spawnProcess(binary, args);
      } catch (error) {
        resolve(
          failure(
            InvocationErrorCode.TOOL_UNAVAILABLE,
            `Cannot start ${toolName}: ${error instanceof Error ? error.message : String(error)}`,
          ),
        );
        return;
      }

      let stdout = '';
      let stderr = '';
      let spawned = false;
      let aborted = false;
      let killError: string | undefined;
      let settled = false;

      const finish = (run: ProcessRun): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        resolve(run);
      };

      const onAbort = (): void => {
        aborted = true;
        if (child.pid === undefined) return;
        this.killTree(child.pid).catch((error: unknown) => {
          killError = error instanceof Error ? error.message : String(error);
        });
      };

      signal.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdout = appendTail(stdout, chunk, STDOUT_TAIL_CHARS);
      });
      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr = appendTail(stderr, chunk, STDERR_TAIL_CHARS);
      });

      child.once('spawn', () => {
        spawned = true;
        if (child.pid !== undefined) this.options.hooks?.onSpawn?.(child.pid);
      });

      child.once('error', (error: Error) => {
        if (!spawned) {
          finish(failure(InvocationErrorCode.TOOL_UNAVAILABLE, `Cannot start ${toolName}: ${error.message}`));
          return;
        }
        finish(failure(InvocationErrorCode.TOOL_FAILED, `${toolName} failed: ${error.message}`));
      });

      child.once('close', (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
        if (spawned && child.pid !== undefined) this.options.hooks?.onExit?.(child.pid);

        const stderrTail = stderr.trim() || undefined;

        if (aborted) {
          const suffix = killError ? ` (kill failed: ${killError})` : '';
          finish({
            success: false,
            error: {
              code: InvocationErrorCode.CANCELLED,
              message: `${toolName} was cancelled${suffix}`,
              exitCode,
              signal: exitSignal,
            },
          });
          return;
        }

        if (exitCode === 0) {
          finish({ success: true, stdout, stderr });
          return;
        }

        finish({
          success: false,
          error: {
            code: InvocationErrorCode.TOOL_FAILED,
            message:
              exitSignal !== null
                ? `${toolName} was killed by ${exitSignal}`
                : `${toolName} exited with code ${exitCode}`,
            exitCode,
            signal: exitSignal,
            stderr: stderrTail,
          },
        });
      });
    });
  }
}
