/**
 * Turns a declarative profile chain into a ResolvedChain.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { CredentialsProvider } from '../types.js';
import type { BuildError } from '../errors/types.js';
import { createUnknownProviderError } from '../errors/errors.js';
import type { NamedProviderRegistry } from '../registry/types.js';
import { createStaticCredentialsProvider } from '../providers/static-provider.js';
import { createWebIdentityTokenProvider } from '../providers/web-identity-provider.js';
import {
  WEB_IDENTITY_TOKEN_PROFILE,
  defaultSessionName,
  type SessionNameGenerator,
} from '../session/session-name.js';
import { createConsoleLogger } from '../logging/logger.js';
import type {
  BaseProviderSpec,
  BuildProviderChainOptions,
  DelegationHop,
  DelegationHopSpec,
  ProfileChain,
  ResolvedChain,
} from './types.js';

interface BaseResolution {
  readonly sessionNames: SessionNameGenerator;
  readonly region: string | undefined;
}

const resolveBase = (
  registry: NamedProviderRegistry,
  spec: BaseProviderSpec,
  options: BaseResolution
): Result<CredentialsProvider, BuildError> => {
  switch (spec.kind) {
    case 'named-source': {
      const provider = registry.lookup(spec.name);
      return provider !== undefined ? ok(provider) : err(createUnknownProviderError(spec.name));
    }
    case 'static-key-pair':
      return ok(
        createStaticCredentialsProvider({
          accessKeyId: spec.accessKeyId,
          secretAccessKey: spec.secretAccessKey,
          sessionToken: spec.sessionToken,
        })
      );
    case 'web-identity-token-role':
      return ok(
        createWebIdentityTokenProvider({
          roleArn: spec.roleArn,
          webIdentityTokenFile: spec.webIdentityTokenFile,
          sessionName: spec.sessionName ?? options.sessionNames(WEB_IDENTITY_TOKEN_PROFILE),
          region: options.region,
        })
      );
  }
};

const describeBase = (spec: BaseProviderSpec): string => {
  switch (spec.kind) {
    case 'named-source':
      return spec.name;
    case 'static-key-pair':
      return 'static key pair';
    case 'web-identity-token-role':
      return `web identity token (${spec.roleArn})`;
  }
};

const toHop = (spec: DelegationHopSpec): DelegationHop =>
  Object.freeze({
    roleArn: spec.roleArn,
    ...(spec.externalId !== undefined ? { externalId: spec.externalId } : {}),
    ...(spec.sessionName !== undefined ? { sessionName: spec.sessionName } : {}),
  });

/**
 * Builds a ResolvedChain from a declarative chain.
 *
 * The base provider is resolved once, here. A named source that the registry
 * does not know fails the build before any hop is constructed; nothing is
 * fetched from the network. Hops keep their declared order and their role
 * ARNs are passed through as given.
 *
 * @param registry - Named sources a `named-source` base may reference
 * @param chain - The declarative chain
 * @param options - Session name generator, logger and region
 * @returns Result with the resolved chain or UNKNOWN_PROVIDER
 *
 * @example
 * ```typescript
 * const result = buildProviderChain(createDefaultNamedProviderRegistry(), {
 *   base: { kind: 'named-source', name: 'Environment' },
 *   hops: [{ roleArn: 'arn:aws:iam::111111111111:role/A' }],
 * });
 *
 * if (result.isOk()) {
 *   await executeChain(result.value, createClientConfiguration());
 * }
 * ```
 */
export const buildProviderChain = (
  registry: NamedProviderRegistry,
  chain: ProfileChain,
  options: BuildProviderChainOptions = {}
): Result<ResolvedChain, BuildError> => {
  const {
    sessionNames = defaultSessionName,
    logger = createConsoleLogger('chain-builder'),
    region,
  } = options;

  const baseResult = resolveBase(registry, chain.base, { sessionNames, region });
  if (baseResult.isErr()) {
    return err(baseResult.error);
  }

  const base = baseResult.value;
  const hops = Object.freeze(chain.hops.map(toHop));

  logger.info('first credentials will be loaded from', {
    source: describeBase(chain.base),
    provider: base.name,
  });
  hops.forEach((hop, index) => {
    logger.info('which will be used to assume a role', {
      hop: index + 1,
      roleArn: hop.roleArn,
    });
  });

  return ok(
    Object.freeze({
      base: (): CredentialsProvider => base,
      hops: (): readonly DelegationHop[] => hops,
    })
  );
};
