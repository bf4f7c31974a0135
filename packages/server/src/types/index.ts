// User and role types
export * from './user.js';

// Tenant types
export * from './tenant.js';

// Token types
export * from './token.js';

// Permission types
export * from './permission.js';

// Service result and context types
export * from './auth.js';

// Hono context types
export * from './hono.js';
