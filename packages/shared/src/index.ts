// Re-export all shared types
export * from './types/api.js';
export * from './types/auth.js';
export * from './types/user.js';
