/**
 * API Response Utilities
 *
 * Standard response formats for REST APIs.
 */

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: Record<string, unknown>;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Create an error response
 */
export function apiError(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiResponse {
  return {
    success: false,
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Create a validation error response
 */
export function validationError(errors: Record<string, string[]>): ApiResponse {
  return apiError('VALIDATION_ERROR', 'Validation failed', { fields: errors });
}

export function notFoundError(resource: string): ApiResponse {
  return apiError('NOT_FOUND', `${resource} not found`);
}

/**
 * Create a server error response. Error details are only exposed
 * outside production.
 */
export function serverError(
  message = 'Internal server error',
  error?: Error,
  env: string = process.env.NODE_ENV ?? 'development'
): ApiResponse {
  const response = apiError('SERVER_ERROR', message);

  if (error && response.error && env !== 'production') {
    response.error.details = {
      name: error.name,
      message: error.message,
    };
    if (env === 'development') {
      response.error.stack = error.stack;
    }
  }

  return response;
}

/**
 * HTTP status codes for common scenarios
 */
export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;
