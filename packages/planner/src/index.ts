export * from './templates.js';
export * from './plan-text.js';
export * from './plan-source.js';
