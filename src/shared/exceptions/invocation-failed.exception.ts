import { HttpException, HttpStatus } from '@nestjs/common';
import {
  InvocationErrorCode,
  InvocationFailure,
} from '../interfaces/invocation-result.interface';

export const HTTP_STATUS_BY_ERROR_CODE: Readonly<Record<InvocationErrorCode, HttpStatus>> = {
  [InvocationErrorCode.TIMEOUT]: HttpStatus.GATEWAY_TIMEOUT,
  [InvocationErrorCode.TOOL_FAILED]: HttpStatus.BAD_GATEWAY,
  [InvocationErrorCode.TOOL_UNAVAILABLE]: HttpStatus.INTERNAL_SERVER_ERROR,
  [InvocationErrorCode.WORKER_CRASHED]: HttpStatus.INTERNAL_SERVER_ERROR,
  [InvocationErrorCode.CANCELLED]: HttpStatus.SERVICE_UNAVAILABLE,
  [InvocationErrorCode.POOL_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
  [InvocationErrorCode.UNKNOWN]: HttpStatus.INTERNAL_SERVER_ERROR,
};

export interface InvocationErrorBody {
  success: false;
  error: string;
  code: InvocationErrorCode;
  invocationId: string;
}

/**
 * A tool invocation that ended without an artifact. Nest renders the body
 * as-is with the status mapped from the failure code.
 */
export class InvocationFailedException extends HttpException {
  constructor(
    public readonly invocationId: string,
    public readonly failure: InvocationFailure,
  ) {
    const body: InvocationErrorBody = {
      success: false,
      error: failure.message,
      code: failure.code,
      invocationId,
    };
    super(body, HTTP_STATUS_BY_ERROR_CODE[failure.code]);
  }
}
