export * from './error-codes.js';
export * from './saml-error.js';
