import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorCode } from '../interfaces/response.interface';

/**
 * 业务异常基类，响应体 { code, message, details? } 由 HttpExceptionFilter 输出
 */
export abstract class DomainException extends HttpException {
  protected constructor(
    readonly code: ErrorCode,
    message: string,
    status: HttpStatus,
    readonly details?: Record<string, unknown>,
  ) {
    super({ code, message, ...(details && { details }) }, status);
  }
}

export class InvalidCredentialsException extends DomainException {
  constructor() {
    super(ErrorCode.INVALID_CREDENTIALS, 'Incorrect email or password', HttpStatus.UNAUTHORIZED);
  }
}

export class EmailTakenException extends DomainException {
  constructor() {
    super(ErrorCode.EMAIL_TAKEN, 'Email already registered', HttpStatus.CONFLICT);
  }
}

export class QuotaExceededException extends DomainException {
  constructor() {
    super(
      ErrorCode.QUOTA_EXCEEDED,
      'No documents remaining. Please purchase a package.',
      HttpStatus.FORBIDDEN,
    );
  }
}

export class UnknownTransactionException extends DomainException {
  constructor() {
    super(ErrorCode.UNKNOWN_TRANSACTION, 'Transaction not found', HttpStatus.NOT_FOUND);
  }
}

export class AlreadyProcessedException extends DomainException {
  constructor(status: string) {
    super(
      ErrorCode.ALREADY_PROCESSED,
      'Transaction has already been processed',
      HttpStatus.CONFLICT,
      { status },
    );
  }
}

export class PaymentNotCompletedException extends DomainException {
  constructor(processorStatus: string) {
    super(
      ErrorCode.PAYMENT_NOT_COMPLETED,
      `Payment not completed (status: ${processorStatus})`,
      HttpStatus.PAYMENT_REQUIRED,
      { processor_status: processorStatus },
    );
  }
}

/**
 * 外部服务（Stripe / Supabase Auth）不可用，客户端可重试
 */
export class UpstreamUnavailableException extends DomainException {
  constructor(service: string) {
    super(
      ErrorCode.UPSTREAM_UNAVAILABLE,
      `${service} is temporarily unavailable, please retry`,
      HttpStatus.SERVICE_UNAVAILABLE,
      { retryable: true },
    );
  }
}
