// Library entry point. `main.ts` runs the server.
export { createAuthServer, type AuthServerOptions } from './app.js';
export * from './services/index.js';
export * from './storage/index.js';
export * from './types/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './middleware/index.js';
export { createLogger, type Logger } from './logging/logger.js';
