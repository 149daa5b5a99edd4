export * from './types.js';
export * from './schemas.js';
export * from './errors.js';
export * from './json.js';
export * from './trace.js';
