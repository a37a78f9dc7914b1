// Programmatic entry point; `main.ts` runs the standalone server
export { createSamlServiceProvider, type SamlServiceProviderOptions } from './app.js';
export { createMemoryStorage, MemoryFederatedIdentityStorage } from './storage/memory/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './idp/index.js';
export * from './claims/index.js';
export * from './saml/index.js';
export * from './backend/index.js';
export * from './routes/saml/index.js';
