import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  ArtifactNotFoundError,
  DecodeError,
  GenerativeServiceError,
  RecordingAccessError,
  RecordingBusyError,
  RecordingNotFoundError,
  errorMessage,
} from './errors';

export function statusFor(error: unknown): number {
  if (error instanceof HttpException) return error.getStatus();
  if (error instanceof DecodeError) return HttpStatus.UNPROCESSABLE_ENTITY;
  if (error instanceof GenerativeServiceError) return HttpStatus.BAD_GATEWAY;
  if (error instanceof RecordingBusyError) return HttpStatus.CONFLICT;
  if (error instanceof RecordingAccessError) return HttpStatus.FORBIDDEN;
  if (
    error instanceof RecordingNotFoundError ||
    error instanceof ArtifactNotFoundError
  ) {
    return HttpStatus.NOT_FOUND;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

@Catch()
export class PipelineExceptionFilter implements ExceptionFilter {
  private readonly log = new Logger(PipelineExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const status = statusFor(exception);

    if (status >= 500) {
      this.log.error(`❌ Request failed: ${errorMessage(exception)}`, exception);
    }

    if (exception instanceof HttpException) {
      res.status(status).json(exception.getResponse());
      return;
    }

    res.status(status).json({
      ok: false,
      error: exception instanceof Error ? exception.name : 'Error',
      message: errorMessage(exception),
    });
  }
}
