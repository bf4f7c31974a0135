export * from './interfaces/index.js';
export { createMemoryStorage, type MemoryStorage } from './memory/index.js';
export {
  createPostgresStorage,
  createPool,
  fromPool,
  type ConnectionSource,
  type PooledConnection,
  type Queryable,
} from './postgres/index.js';
