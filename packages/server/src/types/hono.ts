import type { Context } from 'hono';
import type { AccessTokenPayload } from './token.js';

/**
 * Hono context variables set by the middleware chain
 */
export interface AuthVariables {
  requestId: string;
  accessToken?: AccessTokenPayload; // set by bearerAuth
}

export type AuthContext = Context<{ Variables: AuthVariables }>;
