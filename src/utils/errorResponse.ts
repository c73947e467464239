/**
 * JSON envelopes for the trip API and the error routes throw to produce one.
 * Every failure carries a code from ApiErrorCode; the status follows from it.
 */
import type { FieldError } from '@/types/trip-request';

export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'NOT_RUNNING'
  | 'TRIP_BUSY'
  | 'MODIFICATION_CONFLICT'
  | 'NO_REVISION'
  | 'INTERNAL_ERROR';

const STATUS_BY_CODE: Record<ApiErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  NOT_RUNNING: 409,
  TRIP_BUSY: 409,
  NO_REVISION: 409,
  MODIFICATION_CONFLICT: 422,
  INTERNAL_ERROR: 500,
};

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldError[];
  code: ApiErrorCode;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly status: number;
  readonly errors: FieldError[];

  constructor(code: ApiErrorCode, message: string, errors: FieldError[] = []) {
    super(message);
    this.name = 'ApiError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.errors = errors;
  }

  toResponse(): ErrorResponse {
    return errorBody(this.code, this.message, this.errors);
  }
}

export function errorBody(code: ApiErrorCode, message: string, errors: FieldError[] = []): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors.length > 0 && { errors }),
    code,
  };
}

export function successBody<T>(data: T): SuccessResponse<T> {
  return { success: true, data };
}
