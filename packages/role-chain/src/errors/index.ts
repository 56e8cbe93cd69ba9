/**
 * Error module for chain building and credential resolution.
 *
 * @packageDocumentation
 */

export type {
  BuildErrorCode,
  BuildError,
  CredentialsErrorCode,
  ChainPosition,
  CredentialsError,
} from './types.js';

export {
  createUnknownProviderError,
  createProviderError,
  createCredentialsNotLoadedError,
  createUnhandledError,
  createCancelledError,
  withChainPosition,
  formatCredentialsError,
} from './errors.js';
