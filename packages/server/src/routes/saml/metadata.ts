import { Hono } from 'hono';
import type { SamlVariables } from '../../types/hono.js';
import type { SamlAuthBackend } from '../../backend/saml-auth.js';
import { SamlAuthError } from '../../errors/saml-error.js';
import { XML_CONTENT_TYPE } from '../../config/constants.js';

export interface MetadataRoutesOptions {
  backend: SamlAuthBackend;
}

/**
 * GET /saml/metadata.xml
 * SP metadata, to be registered with each IdP
 */
export function createMetadataRoutes(options: MetadataRoutesOptions): Hono<{ Variables: SamlVariables }> {
  const { backend } = options;
  const app = new Hono<{ Variables: SamlVariables }>();

  app.get('/', async (c) => {
    const { metadata, errors } = await backend.generateMetadataXml();

    if (errors.length > 0) {
      throw SamlAuthError.serverError(`Invalid SP metadata: ${errors.join(', ')}`);
    }

    return c.body(metadata, 200, { 'Content-Type': XML_CONTENT_TYPE });
  });

  return app;
}
