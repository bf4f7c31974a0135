import type { ApiFailure } from '@pharmacy-auth/shared';
import type { AuthVariables } from '../../types/hono.js';
import type { OperationContext } from '../../types/auth.js';
import { ERROR_STATUS_CODES } from '../../errors/error-codes.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

/**
 * Minimal view of a Hono context shared by every auth handler
 */
interface HandlerContext {
  req: { raw: Request };
  get(key: 'requestId'): AuthVariables['requestId'];
  header(name: string, value: string): void;
}

/**
 * Operation context for a request: its abort signal and request id
 */
export function operationContext(c: HandlerContext): OperationContext {
  return { signal: c.req.raw.signal, requestId: c.get('requestId') };
}

/**
 * Responses carrying tokens must never be cached
 */
export function noStore(c: HandlerContext): void {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
}

export function failureStatus(result: ApiFailure) {
  return ERROR_STATUS_CODES[result.error];
}
