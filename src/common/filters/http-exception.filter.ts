import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiError, ApiResponse, ErrorCode } from '../interfaces/response.interface';

function readString(body: object, key: string): string | undefined {
  const value: unknown = Reflect.get(body, key);
  if (typeof value === 'string') return value;
  // ValidationPipe 的 message 是字符串数组
  if (Array.isArray(value) && value.every((v) => typeof v === 'string')) return value.join('; ');
  return undefined;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: ApiError = { code: ErrorCode.INTERNAL_ERROR, message: 'Internal server error' };

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      error = this.toApiError(exception, status);
    } else if (exception instanceof Error) {
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Unhandled error: ${String(exception)}`);
    }

    const errorResponse: ApiResponse = { data: null, error };
    response.status(status).send(errorResponse);
  }

  private toApiError(exception: HttpException, status: number): ApiError {
    const body = exception.getResponse();
    if (typeof body === 'string') {
      return { code: this.mapStatusToErrorCode(status), message: body };
    }

    const details: unknown = Reflect.get(body, 'details');
    return {
      code: readString(body, 'code') ?? this.mapStatusToErrorCode(status),
      message: readString(body, 'message') ?? exception.message,
      ...(details !== undefined && { details }),
    };
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.UNAUTHORIZED:
        return ErrorCode.UNAUTHORIZED;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return ErrorCode.STORAGE_DISABLED;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}
