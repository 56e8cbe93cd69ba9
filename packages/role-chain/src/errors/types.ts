/**
 * Error types for chain building and credential resolution.
 *
 * @packageDocumentation
 */

/**
 * Error codes raised while building a chain.
 */
export type BuildErrorCode = 'UNKNOWN_PROVIDER';

/**
 * Build-time failure. Returned before any network call is made.
 */
export interface BuildError {
  readonly code: BuildErrorCode;
  /** The provider name the chain referenced */
  readonly name: string;
  /** Human-readable error message */
  readonly message: string;
}

/**
 * Error codes raised while resolving credentials.
 */
export type CredentialsErrorCode =
  // The remote service or transport rejected the request
  | 'PROVIDER_ERROR'
  // The provider's source had no credentials to offer
  | 'CREDENTIALS_NOT_LOADED'
  // The provider returned something it should never return
  | 'UNHANDLED'
  // The caller aborted resolution
  | 'CANCELLED';

/**
 * Where in a chain a failure happened.
 */
export type ChainPosition =
  | { readonly stage: 'base' }
  | { readonly stage: 'hop'; readonly index: number; readonly roleArn: string };

/**
 * Credential resolution failure.
 */
export interface CredentialsError {
  /** Error code */
  readonly code: CredentialsErrorCode;
  /** Human-readable error message */
  readonly message: string;
  /** Provider that produced the failure */
  readonly providerName: string;
  /** Underlying cause */
  readonly cause?: unknown;
  /** Set when the error came out of a chain execution */
  readonly position?: ChainPosition | undefined;
  /** Number of hops that succeeded before the failure */
  readonly completedHops?: number | undefined;
}
