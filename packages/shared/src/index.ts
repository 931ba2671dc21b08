export * from './constants.js';
export * from './types/index.js';
export * from './utils/logger.js';
export * from './utils/retry.js';
export * from './utils/env.js';
export * from './utils/errors.js';
export * from './utils/json.js';
export * from './utils/format.js';
