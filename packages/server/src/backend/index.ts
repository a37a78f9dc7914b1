export * from './saml-auth.js';
