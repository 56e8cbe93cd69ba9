/**
 * Types for declaring, building and executing a role chain.
 *
 * @packageDocumentation
 */

import type { CredentialsProvider } from '../types.js';
import type { AssumeRoleCall } from '../sts/types.js';
import type { SessionNameGenerator } from '../session/session-name.js';
import type { Logger } from '../logging/types.js';

// ============================================================================
// Declarative chain
// ============================================================================

/**
 * Base credentials taken from a named source in the provider registry.
 */
export interface NamedSourceSpec {
  readonly kind: 'named-source';
  /** Registry key, e.g. "Environment" */
  readonly name: string;
}

/**
 * Base credentials declared inline as a long-term key pair.
 */
export interface StaticKeyPairSpec {
  readonly kind: 'static-key-pair';
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string | undefined;
}

/**
 * Base credentials obtained by exchanging a web identity token file.
 */
export interface WebIdentityTokenRoleSpec {
  readonly kind: 'web-identity-token-role';
  readonly roleArn: string;
  readonly webIdentityTokenFile: string;
  readonly sessionName?: string | undefined;
}

/**
 * Where the first credentials of a chain come from.
 */
export type BaseProviderSpec = NamedSourceSpec | StaticKeyPairSpec | WebIdentityTokenRoleSpec;

/**
 * One declared role assumption.
 */
export interface DelegationHopSpec {
  /** Role to assume. Passed through unvalidated. */
  readonly roleArn: string;
  readonly externalId?: string | undefined;
  readonly sessionName?: string | undefined;
}

/**
 * A validated, declarative chain as produced by a profile parser.
 */
export interface ProfileChain {
  readonly base: BaseProviderSpec;
  /** Applied in order; may be empty */
  readonly hops: readonly DelegationHopSpec[];
}

// ============================================================================
// Resolved chain
// ============================================================================

/**
 * A hop ready to execute. The session name, when absent, is generated at
 * execution time.
 */
export interface DelegationHop {
  readonly roleArn: string;
  readonly externalId?: string | undefined;
  readonly sessionName?: string | undefined;
}

/**
 * A built chain: the base provider plus hops in declaration order.
 * Immutable and safe to execute concurrently.
 */
export interface ResolvedChain {
  readonly base: () => CredentialsProvider;
  readonly hops: () => readonly DelegationHop[];
}

/**
 * What every hop needs to reach the delegation service.
 */
export interface ClientConfiguration {
  readonly assumeRole: AssumeRoleCall;
  /** Region applied to every hop and to the web identity base */
  readonly region?: string | undefined;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Options for building a chain.
 */
export interface BuildProviderChainOptions {
  /** Source of default session names (default: wall clock) */
  readonly sessionNames?: SessionNameGenerator;
  /** Receives build events (default: console logger scoped "chain-builder") */
  readonly logger?: Logger;
  /** Region for the web identity base provider */
  readonly region?: string | undefined;
}

/**
 * Options for executing one hop.
 */
export interface ExecuteHopOptions {
  readonly abortSignal?: AbortSignal | undefined;
  /** Source of default session names (default: wall clock) */
  readonly sessionNames?: SessionNameGenerator;
}

/**
 * Options for executing a whole chain.
 */
export interface ExecuteChainOptions extends ExecuteHopOptions {
  /** Receives execution events (default: console logger scoped "chain-executor") */
  readonly logger?: Logger;
}

/**
 * Options for a chain-backed credentials provider.
 */
export interface ProfileChainProviderOptions {
  readonly sessionNames?: SessionNameGenerator;
  readonly logger?: Logger;
}
