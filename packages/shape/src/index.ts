export * from './discovery.js';
export * from './normalize.js';
export * from './resolver.js';
export * from './schema-inference.js';
export { aliasIndex, discoveryWords } from './data.js';
export type { AliasIndex, DiscoveryWords } from './data.js';
