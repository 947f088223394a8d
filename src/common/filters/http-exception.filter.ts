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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: ApiError = {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Internal server error',
    };

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      error = this.toApiError(exception, status);
    } else if (exception instanceof Error) {
      // 内部错误只记录日志，不向客户端暴露细节
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Unhandled non-error exception: ${String(exception)}`);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error,
    };

    response.status(status).send(errorResponse);
  }

  private toApiError(exception: HttpException, status: number): ApiError {
    const exceptionResponse = exception.getResponse();

    if (!isRecord(exceptionResponse)) {
      return {
        code: this.mapStatusToErrorCode(status),
        message: String(exceptionResponse),
      };
    }

    // ValidationPipe 的 message 为字符串数组
    const rawMessage = exceptionResponse.message;
    const message = Array.isArray(rawMessage)
      ? rawMessage.map(String).join('; ')
      : typeof rawMessage === 'string'
        ? rawMessage
        : exception.message;
    const code =
      typeof exceptionResponse.code === 'string'
        ? exceptionResponse.code
        : this.mapStatusToErrorCode(status);
    const details = isRecord(exceptionResponse.details) ? exceptionResponse.details : undefined;

    return {
      code,
      message,
      ...(details && { details }),
    };
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.UNAUTHORIZED:
        return ErrorCode.UNAUTHORIZED;
      case HttpStatus.FORBIDDEN:
        return ErrorCode.FORBIDDEN;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.TOO_MANY_REQUESTS:
        return ErrorCode.RATE_LIMITED;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return ErrorCode.UPSTREAM_UNAVAILABLE;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}
