import {
  fromContainerMetadata,
  fromEnv,
  fromInstanceMetadata,
} from '@aws-sdk/credential-providers';
import type { CredentialsProvider } from '../types.js';
import { fromIdentityProvider } from '../providers/identity-provider.js';
import { createNamedProviderRegistry } from './named-registry.js';
import type { NamedProviderRegistry } from './types.js';

/** `credential_source = Environment` */
export const ENVIRONMENT_SOURCE = 'Environment';

/** `credential_source = Ec2InstanceMetadata` */
export const EC2_INSTANCE_METADATA_SOURCE = 'Ec2InstanceMetadata';

/** `credential_source = EcsContainer` */
export const ECS_CONTAINER_SOURCE = 'EcsContainer';

/**
 * Options for the default registry.
 */
export interface DefaultNamedProvidersOptions {
  /** Timeout for instance and container metadata requests in ms */
  readonly metadataTimeoutMs?: number;
  /** Extra named providers; these win over the defaults on a name clash */
  readonly additional?: Readonly<Record<string, CredentialsProvider>>;
}

/**
 * Creates a registry holding the credential sources a profile may name.
 *
 * Nothing is read or requested until a provider is asked for credentials.
 *
 * @param options - Metadata timeout and additional providers
 * @returns A NamedProviderRegistry instance
 */
export const createDefaultNamedProviderRegistry = (
  options: DefaultNamedProvidersOptions = {}
): NamedProviderRegistry => {
  const metadataInit =
    options.metadataTimeoutMs !== undefined ? { timeout: options.metadataTimeoutMs } : {};

  return createNamedProviderRegistry({
    [ENVIRONMENT_SOURCE]: fromIdentityProvider(ENVIRONMENT_SOURCE, fromEnv()),
    [EC2_INSTANCE_METADATA_SOURCE]: fromIdentityProvider(
      EC2_INSTANCE_METADATA_SOURCE,
      fromInstanceMetadata(metadataInit)
    ),
    [ECS_CONTAINER_SOURCE]: fromIdentityProvider(
      ECS_CONTAINER_SOURCE,
      fromContainerMetadata(metadataInit)
    ),
    ...options.additional,
  });
};
