import { ok } from 'neverthrow';
import type { Credentials, CredentialsProvider } from '../types.js';

/** Provider name attached to static credentials */
export const STATIC_PROVIDER_NAME = 'StaticKeyPair';

/**
 * Long-term key pair as declared in a profile.
 */
export interface StaticKeyPair {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string | undefined;
}

/**
 * Creates a provider that always returns the given key pair.
 *
 * No network call is made and the credentials carry no expiration.
 *
 * @param keys - The key pair to return
 * @returns A CredentialsProvider instance
 */
export const createStaticCredentialsProvider = (keys: StaticKeyPair): CredentialsProvider => {
  const credentials: Credentials = Object.freeze({
    accessKeyId: keys.accessKeyId,
    secretAccessKey: keys.secretAccessKey,
    ...(keys.sessionToken !== undefined ? { sessionToken: keys.sessionToken } : {}),
    providerName: STATIC_PROVIDER_NAME,
  });

  return {
    name: STATIC_PROVIDER_NAME,
    provideCredentials: () => Promise.resolve(ok(credentials)),
  };
};
