import { serve } from '@hono/node-server';
import { createSamlServiceProvider } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { ACS_PATH, LOGIN_PATH, METADATA_PATH, PROVIDERS_PATH, SAML_MOUNT_PATH } from './config/constants.js';

// Load configuration
const config = getConfig();
const { baseUrl } = config.server;

console.log('Using in-memory account-link storage. Links will be lost on restart.');

const app = createSamlServiceProvider({
  config: config.saml,
  baseUrl,
  storage: createMemoryStorage(),
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    console.log(`SAML service provider running at http://${info.address}:${info.port}`);
    console.log('');
    console.log('Endpoints:');
    console.log(`  Metadata:  ${baseUrl}${SAML_MOUNT_PATH}${METADATA_PATH}`);
    console.log(`  Providers: ${baseUrl}${SAML_MOUNT_PATH}${PROVIDERS_PATH}`);
    console.log(`  Login:     ${baseUrl}${SAML_MOUNT_PATH}${LOGIN_PATH}?idp=<name>`);
    console.log(`  ACS:       ${baseUrl}${SAML_MOUNT_PATH}${ACS_PATH}`);
    console.log('');
    console.log(`Enabled IdPs: ${Object.keys(config.saml.enabledIdps).join(', ') || '(none)'}`);
  }
);
