export * from './engine.js';
export * from './metadata.js';
export * from './node-saml-engine.js';
export * from './settings.js';
