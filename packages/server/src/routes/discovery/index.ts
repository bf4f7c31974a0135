export { createJWKSRoutes, type JWKSRouteOptions } from './jwks.js';
