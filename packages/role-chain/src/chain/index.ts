/**
 * Role chain building and execution.
 *
 * @packageDocumentation
 */

export type {
  NamedSourceSpec,
  StaticKeyPairSpec,
  WebIdentityTokenRoleSpec,
  BaseProviderSpec,
  DelegationHopSpec,
  ProfileChain,
  DelegationHop,
  ResolvedChain,
  ClientConfiguration,
  BuildProviderChainOptions,
  ExecuteHopOptions,
  ExecuteChainOptions,
  ProfileChainProviderOptions,
} from './types.js';

export { buildProviderChain } from './builder.js';

export { executeHop, ASSUME_ROLE_PROVIDER_NAME } from './hop.js';

export { executeChain } from './executor.js';

export { createProfileChainProvider, PROFILE_CHAIN_PROVIDER_NAME } from './provider.js';
