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
  details?: unknown;
}

/**
 * 错误码枚举
 */
export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  STORAGE_DISABLED = 'STORAGE_DISABLED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
