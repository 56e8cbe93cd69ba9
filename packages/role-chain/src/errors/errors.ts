import type { BuildError, ChainPosition, CredentialsError } from './types.js';

/**
 * Creates a BuildError for a named source that no registry entry satisfies.
 *
 * @param name - The provider name the chain referenced
 * @returns A BuildError object
 */
export const createUnknownProviderError = (name: string): BuildError => ({
  code: 'UNKNOWN_PROVIDER',
  name,
  message: `profile referenced \`${name}\` provider but that provider is not supported`,
});

/**
 * Creates a CredentialsError wrapping a transport or service failure.
 *
 * @param providerName - Provider the failure is attributed to
 * @param message - Error message
 * @param cause - Original error
 * @returns A CredentialsError object
 */
export const createProviderError = (
  providerName: string,
  message: string,
  cause?: unknown
): CredentialsError => ({
  code: 'PROVIDER_ERROR',
  message,
  providerName,
  cause,
});

/**
 * Creates a CredentialsError for a source that had nothing to offer.
 *
 * @param providerName - Provider the failure is attributed to
 * @param message - Error message
 * @param cause - Original error
 * @returns A CredentialsError object
 */
export const createCredentialsNotLoadedError = (
  providerName: string,
  message: string,
  cause?: unknown
): CredentialsError => ({
  code: 'CREDENTIALS_NOT_LOADED',
  message,
  providerName,
  cause,
});

/**
 * Creates a CredentialsError for a response the provider could not use.
 *
 * @param providerName - Provider the failure is attributed to
 * @param message - Error message
 * @param cause - Original error
 * @returns A CredentialsError object
 */
export const createUnhandledError = (
  providerName: string,
  message: string,
  cause?: unknown
): CredentialsError => ({
  code: 'UNHANDLED',
  message,
  providerName,
  cause,
});

/**
 * Creates a CredentialsError for an aborted resolution.
 *
 * @param providerName - Provider that was running when the abort landed
 * @param cause - The abort reason, if any
 * @returns A CredentialsError object
 */
export const createCancelledError = (providerName: string, cause?: unknown): CredentialsError => ({
  code: 'CANCELLED',
  message: 'Credential resolution was cancelled',
  providerName,
  cause,
});

/**
 * Describes a chain position for error messages.
 */
const describePosition = (position: ChainPosition, completedHops: number): string => {
  if (position.stage === 'base') {
    return 'base provider failed';
  }

  return `hop ${String(position.index + 1)} (${position.roleArn}) failed after ${String(completedHops)} completed hop(s)`;
};

/**
 * Attaches chain position to an error raised by a base provider or hop.
 *
 * @param error - The error as returned by the provider
 * @param position - Where the chain stopped
 * @param completedHops - Hops that had succeeded before the failure
 * @returns A new CredentialsError carrying the position
 */
export const withChainPosition = (
  error: CredentialsError,
  position: ChainPosition,
  completedHops: number
): CredentialsError => ({
  ...error,
  message: `${describePosition(position, completedHops)}: ${error.message}`,
  position,
  completedHops,
});

/**
 * Renders a CredentialsError as a single diagnostic line.
 *
 * @param error - The error to render
 * @returns e.g. "[PROVIDER_ERROR] AssumeRoleProvider: ..."
 */
export const formatCredentialsError = (error: CredentialsError): string =>
  `[${error.code}] ${error.providerName}: ${error.message}`;
