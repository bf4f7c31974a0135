export * from './hash.js';
export * from './random.js';
export * from './password.js';
export * from './keys.js';
export * from './jwt.js';
