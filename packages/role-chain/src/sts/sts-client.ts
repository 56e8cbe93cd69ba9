/**
 * Default AssumeRole call backed by the AWS SDK STS client.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import {
  STSClient,
  AssumeRoleCommand,
  STSServiceException,
  type AssumeRoleCommandOutput,
  type STSClientConfig,
} from '@aws-sdk/client-sts';
import type { AwsCredentialIdentity } from '@smithy/types';
import type { Credentials } from '../types.js';
import type { AssumeRoleCall, TransportError } from './types.js';

/**
 * Minimal STS client surface used by the call.
 */
export interface StsSender {
  readonly send: (
    command: AssumeRoleCommand,
    options?: { readonly abortSignal?: AbortSignal }
  ) => Promise<AssumeRoleCommandOutput>;
  /** Releases the client's HTTP handler */
  readonly destroy: () => void;
}

/**
 * Builds an STS client for one call.
 */
export type StsClientFactory = (config: STSClientConfig) => StsSender;

/**
 * Options for the default AssumeRole call.
 */
export interface StsAssumeRoleCallOptions {
  /** Client factory (default: a fresh STSClient per call) */
  readonly createClient?: StsClientFactory;
}

const createSdkClient: StsClientFactory = (config) => {
  const client = new STSClient(config);
  return {
    send: (command, options) => client.send(command, options),
    destroy: () => client.destroy(),
  };
};

const toIdentity = (credentials: Credentials): AwsCredentialIdentity => ({
  accessKeyId: credentials.accessKeyId,
  secretAccessKey: credentials.secretAccessKey,
  ...(credentials.sessionToken !== undefined ? { sessionToken: credentials.sessionToken } : {}),
  ...(credentials.expiration !== undefined ? { expiration: credentials.expiration } : {}),
});

/**
 * Maps anything thrown by the SDK to a TransportError.
 */
export const toTransportError = (error: unknown): TransportError => {
  if (error instanceof STSServiceException) {
    return {
      type: 'service',
      message: `${error.name}: ${error.message}`,
      code: error.name,
      status: error.$metadata.httpStatusCode,
      cause: error,
    };
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return { type: 'aborted', message: 'AssumeRole request was aborted', cause: error };
  }

  return {
    type: 'network',
    message: error instanceof Error ? error.message : 'Network error',
    cause: error,
  };
};

/**
 * Creates an AssumeRole call that talks to STS through the AWS SDK.
 *
 * Each call builds a client signed with the scope's credentials and destroys
 * it once the request settles, so no client state is shared between hops.
 * Retries are disabled.
 *
 * @param options - Client factory override
 * @returns An AssumeRoleCall
 *
 * @example
 * ```typescript
 * const assumeRole = createStsAssumeRoleCall();
 * const result = await assumeRole(
 *   { roleArn: 'arn:aws:iam::111111111111:role/A', roleSessionName: 'audit' },
 *   { credentials, region: 'us-east-1' }
 * );
 * ```
 */
export const createStsAssumeRoleCall = (options: StsAssumeRoleCallOptions = {}): AssumeRoleCall => {
  const { createClient = createSdkClient } = options;

  return async (request, scope, callOptions = {}) => {
    const client = createClient({
      credentials: toIdentity(scope.credentials),
      maxAttempts: 1,
      ...(scope.region !== undefined ? { region: scope.region } : {}),
    });

    const command = new AssumeRoleCommand({
      RoleArn: request.roleArn,
      RoleSessionName: request.roleSessionName,
      ...(request.externalId !== undefined ? { ExternalId: request.externalId } : {}),
    });

    try {
      const output = await client.send(
        command,
        callOptions.abortSignal !== undefined ? { abortSignal: callOptions.abortSignal } : {}
      );
      return ok({ Credentials: output.Credentials, AssumedRoleUser: output.AssumedRoleUser });
    } catch (error) {
      return err(toTransportError(error));
    } finally {
      client.destroy();
    }
  };
};
