/**
 * Types for the remote assume-role call boundary.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { AssumeRoleCommandOutput, Credentials as StsCredentials } from '@aws-sdk/client-sts';
import type { Credentials } from '../types.js';

export type { StsCredentials };

/**
 * Parameters of one AssumeRole request.
 */
export interface AssumeRoleRequest {
  /** ARN of the role to assume */
  readonly roleArn: string;
  /** Session name recorded by the service */
  readonly roleSessionName: string;
  /** Confused-deputy token required by the role's trust policy */
  readonly externalId?: string | undefined;
}

/**
 * Calling identity and region for one AssumeRole request.
 */
export interface AssumeRoleScope {
  /** Credentials the request is signed with */
  readonly credentials: Credentials;
  /** Region of the STS endpoint */
  readonly region?: string | undefined;
}

/**
 * Per-call options.
 */
export interface AssumeRoleCallOptions {
  readonly abortSignal?: AbortSignal | undefined;
}

/**
 * The parts of the AssumeRole output the chain consumes.
 */
export type AssumeRoleResponse = Pick<AssumeRoleCommandOutput, 'Credentials' | 'AssumedRoleUser'>;

/**
 * Transport or service failure of an AssumeRole call.
 */
export interface TransportError {
  readonly type: 'network' | 'service' | 'aborted';
  readonly message: string;
  /** Service error code (e.g. "AccessDenied") */
  readonly code?: string | undefined;
  /** HTTP status of the service response */
  readonly status?: number | undefined;
  readonly cause?: unknown;
}

/**
 * The remote delegation call. Exactly one round trip, no retries.
 */
export type AssumeRoleCall = (
  request: AssumeRoleRequest,
  scope: AssumeRoleScope,
  options?: AssumeRoleCallOptions
) => Promise<Result<AssumeRoleResponse, TransportError>>;
