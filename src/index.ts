// AIP model and per-folder stages
export * from './aip/index.js';

// Batch driver, status log, metadata.csv
export * from './batch/index.js';

// Configuration
export * from './config/index.js';

// External tools
export * from './tools/index.js';

// Metadata stages
export * from './metadata/index.js';

// Packaging and manifests
export * from './packaging/index.js';

// Transfer-bag preprocessing
export * from './transfer/index.js';

// Batch-root lock
export { BatchLock, LockError, readLockHolder } from './safety/batch-lock.js';
export type { LockHolder } from './safety/batch-lock.js';
