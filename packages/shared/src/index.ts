// Re-export all shared types
export * from './types/identity-provider.js';
export * from './types/identity.js';
export * from './types/service-provider.js';
export * from './types/saml.js';
export * from './types/api.js';
