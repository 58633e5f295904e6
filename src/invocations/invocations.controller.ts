import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Res,
  StreamableFile,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { createReadStream, promises as fs } from 'fs';
import { RunInvocationUseCase } from '../application/use-cases/run-invocation.use-case';
import { RunInvocationResult } from '../application/ports/input/run-invocation.port';
import { CORRELATION_ID_HEADER } from '../shared/logging/correlation-id.middleware';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  validateFetchMediaRequest,
  validateTranscodeMediaRequest,
} from './dto/media-request.dto';

export const INVOCATION_ID_HEADER = 'X-Invocation-Id';

/**
 * HTTP surface of the tool runner. Each request holds its connection until
 * the invocation finishes, then streams the produced file back and deletes
 * it once the stream closes.
 */
@Controller('invocations')
export class InvocationsController {
  constructor(
    private readonly runInvocation: RunInvocationUseCase,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(InvocationsController.name);
  }

  @Post('fetch')
  @HttpCode(HttpStatus.OK)
  async fetch(
    @Body() body: unknown,
    @Headers(CORRELATION_ID_HEADER) correlationId: string | undefined,
    @Res({ passthrough: true }) reply: Pick<FastifyReply, 'header'>,
  ): Promise<StreamableFile> {
    const request = validateFetchMediaRequest(body);
    const result = await this.runInvocation.execute({ kind: 'fetch', request, correlationId });
    return this.streamArtifact(result, reply);
  }

  @Post('transcode')
  @HttpCode(HttpStatus.OK)
  async transcode(
    @Body() body: unknown,
    @Headers(CORRELATION_ID_HEADER) correlationId: string | undefined,
    @Res({ passthrough: true }) reply: Pick<FastifyReply, 'header'>,
  ): Promise<StreamableFile> {
    const request = validateTranscodeMediaRequest(body);
    const result = await this.runInvocation.execute({ kind: 'transcode', request, correlationId });
    return this.streamArtifact(result, reply);
  }

  private streamArtifact(
    result: RunInvocationResult,
    reply: Pick<FastifyReply, 'header'>,
  ): StreamableFile {
    const { invocationId, artifact } = result;
    const stream = createReadStream(artifact.path);

    stream.once('close', () => {
      fs.rm(artifact.path, { force: true }).catch((error: unknown) => {
        this.logger.warn(
          {
            invocationId,
            path: artifact.path,
            error: error instanceof Error ? error.message : String(error),
          },
          'Failed to delete artifact after streaming',
        );
      });
    });

    reply.header(INVOCATION_ID_HEADER, invocationId);

    return new StreamableFile(stream, {
      type: artifact.contentType,
      disposition: `attachment; filename="${invocationId}.${artifact.format || 'bin'}"`,
      length: artifact.sizeBytes,
    });
  }
}
