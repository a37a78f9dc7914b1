import type {
  IdentityProviderConfig,
  IdentityProviderDescriptor,
  IdentityProviderInput,
} from '@saml-federation/shared';
import { UnknownProviderError } from '../errors/saml-error.js';
import {
  createIdentityProviderConfig,
  createPlaceholderIdentityProvider,
  toIdentityProviderDescriptor,
} from './identity-provider.js';

/**
 * Read-only table of the enabled identity providers
 */
export class IdentityProviderRegistry {
  private readonly providers = new Map<string, IdentityProviderConfig>();

  /**
   * @throws InvalidConfigurationError on the first invalid entry
   */
  constructor(enabledIdps: Record<string, IdentityProviderInput>) {
    for (const [name, input] of Object.entries(enabledIdps)) {
      this.providers.set(name, createIdentityProviderConfig(name, input));
    }
  }

  /**
   * Get the configuration of a provider by name
   *
   * @throws UnknownProviderError if no provider has this name
   */
  resolve(name: string): IdentityProviderConfig {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new UnknownProviderError(name);
    }
    return provider;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /**
   * All providers, in configuration order
   */
  list(): IdentityProviderConfig[] {
    return Array.from(this.providers.values());
  }

  /**
   * Descriptor for a metadata generator. Without a name, describes the
   * placeholder provider.
   */
  metadataDescriptor(name?: string): IdentityProviderDescriptor {
    const provider = name === undefined ? createPlaceholderIdentityProvider() : this.resolve(name);
    return toIdentityProviderDescriptor(provider);
  }
}
