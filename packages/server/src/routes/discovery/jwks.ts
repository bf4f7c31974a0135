import { Hono } from 'hono';
import type { AuthVariables } from '../../types/hono.js';
import type { KeyRing } from '../../crypto/keys.js';

export interface JWKSRouteOptions {
  keyRing: KeyRing;
}

/**
 * Create JWKS endpoint
 *
 * GET /.well-known/jwks.json
 *
 * Publishes the current key and every retired key still accepted for
 * verification, so portals can validate tokens issued before a rotation.
 */
export function createJWKSRoutes(options: JWKSRouteOptions) {
  const { keyRing } = options;

  const router = new Hono<{ Variables: AuthVariables }>();

  router.get('/', (c) => {
    // Cache for 1 hour
    c.header('Cache-Control', 'public, max-age=3600');

    return c.json(keyRing.toJWKS());
  });

  return router;
}
