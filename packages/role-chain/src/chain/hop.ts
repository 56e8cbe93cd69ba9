import { err, type Result } from 'neverthrow';
import type { Credentials } from '../types.js';
import type { CredentialsError } from '../errors/types.js';
import { createCancelledError, createProviderError } from '../errors/errors.js';
import { ASSUME_ROLE_FROM_PROFILE, defaultSessionName } from '../session/session-name.js';
import { intoCredentials } from '../sts/into-credentials.js';
import type { AssumeRoleRequest } from '../sts/types.js';
import type { ClientConfiguration, DelegationHop, ExecuteHopOptions } from './types.js';

/** Provider name attached to credentials issued by a hop */
export const ASSUME_ROLE_PROVIDER_NAME = 'AssumeRoleProvider';

/**
 * Assumes one role using the upstream credentials as the caller identity.
 *
 * Makes exactly one AssumeRole call and never retries. A transport failure
 * becomes PROVIDER_ERROR with the transport error as `cause`; an aborted
 * call becomes CANCELLED. A response without a complete credential set
 * becomes UNHANDLED.
 *
 * @param hop - Role to assume
 * @param upstream - Credentials the request is signed with
 * @param clientConfig - AssumeRole call and region
 * @param options - Abort signal and session name generator
 * @returns Result with the new credentials or error
 *
 * @example
 * ```typescript
 * const result = await executeHop(
 *   { roleArn: 'arn:aws:iam::111111111111:role/A', externalId: 'eid' },
 *   baseCredentials,
 *   createClientConfiguration({ region: 'us-east-1' })
 * );
 * ```
 */
export const executeHop = async (
  hop: DelegationHop,
  upstream: Credentials,
  clientConfig: ClientConfiguration,
  options: ExecuteHopOptions = {}
): Promise<Result<Credentials, CredentialsError>> => {
  const { abortSignal, sessionNames = defaultSessionName } = options;

  if (abortSignal?.aborted === true) {
    return err(createCancelledError(ASSUME_ROLE_PROVIDER_NAME, abortSignal.reason));
  }

  const request: AssumeRoleRequest = {
    roleArn: hop.roleArn,
    roleSessionName: hop.sessionName ?? sessionNames(ASSUME_ROLE_FROM_PROFILE),
    ...(hop.externalId !== undefined ? { externalId: hop.externalId } : {}),
  };

  const response = await clientConfig.assumeRole(
    request,
    {
      credentials: upstream,
      ...(clientConfig.region !== undefined ? { region: clientConfig.region } : {}),
    },
    abortSignal !== undefined ? { abortSignal } : {}
  );

  if (response.isErr()) {
    const transportError = response.error;
    if (transportError.type === 'aborted') {
      return err(createCancelledError(ASSUME_ROLE_PROVIDER_NAME, transportError));
    }
    return err(
      createProviderError(
        ASSUME_ROLE_PROVIDER_NAME,
        `AssumeRole for ${hop.roleArn} failed: ${transportError.message}`,
        transportError
      )
    );
  }

  return intoCredentials(response.value.Credentials, ASSUME_ROLE_PROVIDER_NAME);
};
