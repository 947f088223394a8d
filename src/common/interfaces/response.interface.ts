/**
 * 统一响应格式
 * { data: T | null, error: { code, message, details? } | null }
 */
export interface ApiResponse<T = unknown> {
  data: T | null;
  error: ApiError | null;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * 错误码枚举
 */
export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
  QUOTA_EXCEEDED = 'QUOTA_EXCEEDED',
  EMAIL_TAKEN = 'EMAIL_TAKEN',
  UNKNOWN_TRANSACTION = 'UNKNOWN_TRANSACTION',
  ALREADY_PROCESSED = 'ALREADY_PROCESSED',
  PAYMENT_NOT_COMPLETED = 'PAYMENT_NOT_COMPLETED',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * 分页响应
 */
export interface PaginatedResponse<T> {
  items: T[];
  next_cursor: string | null;
}

/**
 * 当前用户上下文（由 AuthGuard 写入请求）
 */
export interface CurrentUser {
  id: string; // Supabase Auth user id = accounts.id
  email: string | null;
}
