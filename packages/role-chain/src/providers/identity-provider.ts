/**
 * Adapter from AWS SDK identity providers to CredentialsProvider.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@smithy/types';
import type { Credentials, CredentialsProvider, ProvideCredentialsOptions } from '../types.js';
import type { CredentialsError } from '../errors/types.js';
import {
  createCancelledError,
  createCredentialsNotLoadedError,
  createProviderError,
} from '../errors/errors.js';

/** Error name the AWS SDK uses when a source simply has no credentials */
const NOT_LOADED_ERROR_NAME = 'CredentialsProviderError';

const toCredentials = (identity: AwsCredentialIdentity, providerName: string): Credentials => ({
  accessKeyId: identity.accessKeyId,
  secretAccessKey: identity.secretAccessKey,
  sessionToken: identity.sessionToken,
  expiration: identity.expiration,
  providerName,
});

/**
 * Maps a rejection from an AWS SDK provider to CredentialsError.
 */
const toCredentialsError = (providerName: string, error: unknown): CredentialsError => {
  if (error instanceof Error && error.name === NOT_LOADED_ERROR_NAME) {
    return createCredentialsNotLoadedError(providerName, error.message, error);
  }

  const detail = error instanceof Error ? error.message : String(error);
  return createProviderError(
    providerName,
    `Failed to load credentials from ${providerName}: ${detail}`,
    error
  );
};

/**
 * Wraps an AWS SDK credential provider function.
 *
 * @param name - Provider name used for attribution
 * @param identityProvider - Provider such as `fromEnv()` or `fromTokenFile()`
 * @returns A CredentialsProvider instance
 *
 * @example
 * ```typescript
 * import { fromEnv } from '@aws-sdk/credential-providers';
 *
 * const environment = fromIdentityProvider('Environment', fromEnv());
 * const result = await environment.provideCredentials();
 * ```
 */
export const fromIdentityProvider = (
  name: string,
  identityProvider: AwsCredentialIdentityProvider
): CredentialsProvider => {
  const provideCredentials = async (
    options: ProvideCredentialsOptions = {}
  ): ReturnType<CredentialsProvider['provideCredentials']> => {
    const { abortSignal } = options;
    if (abortSignal?.aborted === true) {
      return err(createCancelledError(name, abortSignal.reason));
    }

    try {
      const identity = await identityProvider();
      return ok(toCredentials(identity, name));
    } catch (error) {
      return err(toCredentialsError(name, error));
    }
  };

  return { name, provideCredentials };
};
