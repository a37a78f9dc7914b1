import { readFileSync, existsSync } from 'node:fs';
import type { ServiceProviderConfig } from '@saml-federation/shared';
import { InvalidConfigurationError } from '../errors/saml-error.js';
import { serviceProviderConfigSchema } from './schema.js';
import * as constants from './constants.js';

type Env = Record<string, string | undefined>;

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(envVar: string, env: Env = process.env): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new InvalidConfigurationError(`${envVar}_FILE points to a missing file: ${filePath}`);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  // Fall back to direct environment variable
  return env[envVar];
}

/**
 * Environment variables holding JSON, by config key
 */
const JSON_ENV_VARS = {
  organization: 'SAML_ORG_INFO',
  technicalContact: 'SAML_TECHNICAL_CONTACT',
  supportContact: 'SAML_SUPPORT_CONTACT',
  enabledIdps: 'SAML_ENABLED_IDPS',
  securityConfig: 'SAML_SECURITY_CONFIG',
  spExtra: 'SAML_SP_EXTRA',
  nameIdFormats: 'SAML_SP_NAMEID_FORMATS',
} as const;

function parseJson(source: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigurationError(
      `${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) {
    throw new InvalidConfigurationError(`SAML_CONFIG_FILE points to a missing file: ${filePath}`);
  }

  const content = parseJson(filePath, readFileSync(filePath, 'utf-8'));
  if (!isRecord(content)) {
    throw new InvalidConfigurationError(`${filePath} should contain a JSON object`);
  }
  return content;
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    /** Public origin the SP is reached at */
    baseUrl: string;
  };
  saml: ServiceProviderConfig;
}

/**
 * Service provider configuration: the JSON file named by SAML_CONFIG_FILE,
 * overridden key by key by the SAML_* environment variables
 *
 * @throws InvalidConfigurationError listing every offending path
 */
export function loadServiceProviderConfig(env: Env, baseUrl: string): ServiceProviderConfig {
  const raw: Record<string, unknown> = env['SAML_CONFIG_FILE']
    ? readConfigFile(env['SAML_CONFIG_FILE'])
    : {};

  raw['entityId'] =
    env['SAML_SP_ENTITY_ID'] ??
    raw['entityId'] ??
    `${baseUrl}${constants.SAML_MOUNT_PATH}${constants.METADATA_PATH}`;

  const publicCert = readSecret('SAML_SP_PUBLIC_CERT', env);
  if (publicCert !== undefined) raw['publicCert'] = publicCert;

  const privateKey = readSecret('SAML_SP_PRIVATE_KEY', env);
  if (privateKey !== undefined) raw['privateKey'] = privateKey;

  for (const [key, envVar] of Object.entries(JSON_ENV_VARS)) {
    const value = env[envVar];
    if (value) {
      raw[key] = parseJson(envVar, value);
    }
  }

  const result = serviceProviderConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new InvalidConfigurationError(`Invalid SAML configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const port = parseInt(env['PORT'] ?? String(constants.DEFAULT_PORT), 10);
  if (Number.isNaN(port)) {
    throw new InvalidConfigurationError(`PORT should be a number, got "${env['PORT']}"`);
  }

  const baseUrl = (env['BASE_URL'] ?? `http://localhost:${port}`).replace(/\/+$/, '');

  return {
    server: {
      port,
      host: env['HOST'] ?? constants.DEFAULT_HOST,
      nodeEnv: env['NODE_ENV'] ?? 'development',
      baseUrl,
    },
    saml: loadServiceProviderConfig(env, baseUrl),
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
