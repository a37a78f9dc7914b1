export * from './identity-provider.js';
export * from './registry.js';
