import type { Result } from 'neverthrow';
import type { CredentialsError } from './errors/types.js';

/**
 * A set of AWS credentials produced by a base provider or a role assumption.
 *
 * Values are never mutated; each hop of a chain produces a new one.
 */
export interface Credentials {
  /** AWS access key ID */
  readonly accessKeyId: string;
  /** AWS secret access key */
  readonly secretAccessKey: string;
  /** Session token (temporary credentials only) */
  readonly sessionToken?: string | undefined;
  /** When the credentials stop being valid (temporary credentials only) */
  readonly expiration?: Date | undefined;
  /** Name of the provider that issued these credentials */
  readonly providerName: string;
}

/**
 * Options accepted by every credentials provider.
 */
export interface ProvideCredentialsOptions {
  /** Aborts any in-flight network call made by the provider */
  readonly abortSignal?: AbortSignal | undefined;
}

/**
 * Anything that can supply credentials.
 *
 * Providers are shared: a single instance may back many chains and may be
 * asked for credentials concurrently.
 */
export interface CredentialsProvider {
  /** Provider name used for error attribution and logging */
  readonly name: string;

  /**
   * Loads credentials from the provider's source.
   *
   * @param options - Per-call options
   * @returns Result with credentials or error
   */
  readonly provideCredentials: (
    options?: ProvideCredentialsOptions
  ) => Promise<Result<Credentials, CredentialsError>>;
}
