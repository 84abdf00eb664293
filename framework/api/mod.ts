/**
 * API Layer
 *
 * Standard JSON envelopes for success and error responses.
 */

export {
  apiError,
  validationError,
  notFoundError,
  serverError,
  HttpStatus,
  type ApiResponse,
  type ApiError,
} from './response.ts';
