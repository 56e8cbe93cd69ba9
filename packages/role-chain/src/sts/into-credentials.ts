import { ok, err, type Result } from 'neverthrow';
import type { Credentials } from '../types.js';
import type { CredentialsError } from '../errors/types.js';
import { createUnhandledError } from '../errors/errors.js';
import type { StsCredentials } from './types.js';

/**
 * Converts the credential set returned by STS into canonical credentials.
 *
 * STS always returns all four fields on success; a missing one means the
 * response cannot be used.
 *
 * @param stsCredentials - `Credentials` member of an STS response
 * @param providerName - Provider the credentials are attributed to
 * @returns Result with credentials or UNHANDLED error
 */
export const intoCredentials = (
  stsCredentials: StsCredentials | undefined,
  providerName: string
): Result<Credentials, CredentialsError> => {
  if (stsCredentials === undefined) {
    return err(createUnhandledError(providerName, 'STS credentials must be defined'));
  }

  const { AccessKeyId, SecretAccessKey, SessionToken, Expiration } = stsCredentials;

  if (AccessKeyId === undefined) {
    return err(createUnhandledError(providerName, 'access key id missing from result'));
  }
  if (SecretAccessKey === undefined) {
    return err(createUnhandledError(providerName, 'secret access key missing'));
  }
  if (SessionToken === undefined) {
    return err(createUnhandledError(providerName, 'session token missing'));
  }
  if (Expiration === undefined) {
    return err(createUnhandledError(providerName, 'missing expiration'));
  }

  return ok({
    accessKeyId: AccessKeyId,
    secretAccessKey: SecretAccessKey,
    sessionToken: SessionToken,
    expiration: Expiration,
    providerName,
  });
};
