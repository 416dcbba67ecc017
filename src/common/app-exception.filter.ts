import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { AppError, errorMessage } from './errors';

export type ErrorPayload = {
  error: { kind: string; message: string };
};

const KIND_BY_STATUS: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'BAD_REQUEST',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'SERVICE_UNAVAILABLE',
};

@Catch()
export class AppExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, payload } = this.toPayload(exception);

    if (status >= 500) {
      this.logger.error(
        `${payload.error.kind}: ${payload.error.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${payload.error.kind}: ${payload.error.message}`);
    }

    res.status(status).json(payload);
  }

  private toPayload(exception: unknown): {
    status: number;
    payload: ErrorPayload;
  } {
    if (exception instanceof AppError) {
      const { kind, message } = exception;
      return {
        status: exception.status,
        payload: { error: { kind, message } },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        payload: {
          error: {
            kind:
              KIND_BY_STATUS[status] ??
              (status >= 500 ? 'INTERNAL' : 'HTTP_ERROR'),
            message: exception.message,
          },
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      payload: {
        error: { kind: 'INTERNAL', message: errorMessage(exception) },
      },
    };
  }
}
