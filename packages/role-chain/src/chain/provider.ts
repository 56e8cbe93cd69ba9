import type { CredentialsProvider } from '../types.js';
import { executeChain } from './executor.js';
import type { ClientConfiguration, ProfileChainProviderOptions, ResolvedChain } from './types.js';

/** Name of a chain-backed provider */
export const PROFILE_CHAIN_PROVIDER_NAME = 'ProfileChain';

/**
 * Exposes a resolved chain as a CredentialsProvider.
 *
 * Every call runs the whole chain again; issued credentials are not cached.
 *
 * @param chain - A chain from `buildProviderChain`
 * @param clientConfig - AssumeRole call and region
 * @param options - Session name generator and logger
 * @returns A CredentialsProvider instance
 */
export const createProfileChainProvider = (
  chain: ResolvedChain,
  clientConfig: ClientConfiguration,
  options: ProfileChainProviderOptions = {}
): CredentialsProvider => ({
  name: PROFILE_CHAIN_PROVIDER_NAME,
  provideCredentials: (callOptions = {}) =>
    executeChain(chain, clientConfig, {
      ...options,
      ...(callOptions.abortSignal !== undefined ? { abortSignal: callOptions.abortSignal } : {}),
    }),
});
