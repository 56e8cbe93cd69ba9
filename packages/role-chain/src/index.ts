/**
 * Role chain - resolves and executes assume-role credential chains
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Chain Building and Execution
// ============================================================================

export {
  buildProviderChain,
  executeHop,
  executeChain,
  createProfileChainProvider,
  ASSUME_ROLE_PROVIDER_NAME,
  PROFILE_CHAIN_PROVIDER_NAME,
} from './chain/index.js';
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
} from './chain/index.js';

// ============================================================================
// CORE: Configuration
// ============================================================================

export { createClientConfiguration, RegionSchema } from './config/index.js';
export type { ClientConfigurationOptions } from './config/index.js';

// ============================================================================
// Providers and Registry
// ============================================================================

export {
  createNamedProviderRegistry,
  createDefaultNamedProviderRegistry,
  ENVIRONMENT_SOURCE,
  EC2_INSTANCE_METADATA_SOURCE,
  ECS_CONTAINER_SOURCE,
} from './registry/index.js';
export type {
  NamedProviderRegistry,
  NamedProviderEntries,
  DefaultNamedProvidersOptions,
} from './registry/index.js';

export {
  createStaticCredentialsProvider,
  fromIdentityProvider,
  createWebIdentityTokenProvider,
  STATIC_PROVIDER_NAME,
  WEB_IDENTITY_PROVIDER_NAME,
} from './providers/index.js';
export type {
  StaticKeyPair,
  WebIdentityTokenRole,
  TokenFileProviderFactory,
} from './providers/index.js';

// ============================================================================
// AssumeRole Boundary
// ============================================================================

export { createStsAssumeRoleCall, intoCredentials, toTransportError } from './sts/index.js';
export type {
  StsCredentials,
  AssumeRoleRequest,
  AssumeRoleScope,
  AssumeRoleCallOptions,
  AssumeRoleResponse,
  TransportError,
  AssumeRoleCall,
  StsSender,
  StsClientFactory,
  StsAssumeRoleCallOptions,
} from './sts/index.js';

// ============================================================================
// Session Names
// ============================================================================

export {
  ASSUME_ROLE_FROM_PROFILE,
  WEB_IDENTITY_TOKEN_PROFILE,
  createSessionNameGenerator,
  defaultSessionName,
} from './session/index.js';
export type { SessionNamePurpose, SessionNameGenerator } from './session/index.js';

// ============================================================================
// Errors and Logging
// ============================================================================

export {
  createUnknownProviderError,
  createProviderError,
  createCredentialsNotLoadedError,
  createUnhandledError,
  createCancelledError,
  withChainPosition,
  formatCredentialsError,
} from './errors/index.js';
export type {
  BuildErrorCode,
  BuildError,
  CredentialsErrorCode,
  ChainPosition,
  CredentialsError,
} from './errors/index.js';

export { createConsoleLogger, createSilentLogger, formatLogLine } from './logging/index.js';
export type { LogLevel, LogFields, Logger, ConsoleLoggerOptions } from './logging/index.js';
