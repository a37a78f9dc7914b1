// Shared SAML and API types
export type * from '@saml-federation/shared';

// Hono context types
export type { SamlVariables } from './hono.js';
