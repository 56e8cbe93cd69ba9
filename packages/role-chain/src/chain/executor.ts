/**
 * Sequential execution of a resolved chain.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { Credentials, ProvideCredentialsOptions } from '../types.js';
import type { ChainPosition, CredentialsError } from '../errors/types.js';
import { createCancelledError, withChainPosition } from '../errors/errors.js';
import { createConsoleLogger } from '../logging/logger.js';
import { ASSUME_ROLE_PROVIDER_NAME, executeHop } from './hop.js';
import type {
  ClientConfiguration,
  ExecuteChainOptions,
  ExecuteHopOptions,
  ResolvedChain,
} from './types.js';

const BASE_POSITION: ChainPosition = Object.freeze({ stage: 'base' });

// Read through a call so each check sees the signal's current state.
const isAborted = (signal: AbortSignal | undefined): boolean => signal?.aborted === true;

/**
 * Runs a chain: loads the base credentials, then assumes each hop's role
 * with the previous step's credentials.
 *
 * Hops run strictly one after another in declared order. The abort signal is
 * checked before every step; once it fires, no further step starts and the
 * result is CANCELLED. The first failure ends the run. Errors carry the
 * position the chain stopped at and how many hops had completed.
 *
 * @param chain - A chain from `buildProviderChain`
 * @param clientConfig - AssumeRole call and region
 * @param options - Abort signal, session name generator and logger
 * @returns Result with the final credentials or error
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const result = await executeChain(chain, clientConfig, {
 *   abortSignal: controller.signal,
 * });
 *
 * if (result.isErr()) {
 *   console.error(formatCredentialsError(result.error));
 * }
 * ```
 */
export const executeChain = async (
  chain: ResolvedChain,
  clientConfig: ClientConfiguration,
  options: ExecuteChainOptions = {}
): Promise<Result<Credentials, CredentialsError>> => {
  const { abortSignal, sessionNames, logger = createConsoleLogger('chain-executor') } = options;
  const base = chain.base();

  if (isAborted(abortSignal)) {
    return err(
      withChainPosition(createCancelledError(base.name, abortSignal?.reason), BASE_POSITION, 0)
    );
  }

  const providerOptions: ProvideCredentialsOptions =
    abortSignal !== undefined ? { abortSignal } : {};
  const baseResult = await base.provideCredentials(providerOptions);
  if (baseResult.isErr()) {
    logger.debug('base provider failed', { provider: base.name, code: baseResult.error.code });
    return err(withChainPosition(baseResult.error, BASE_POSITION, 0));
  }

  logger.debug('loaded base credentials', { provider: baseResult.value.providerName });

  const hopOptions: ExecuteHopOptions = {
    ...(abortSignal !== undefined ? { abortSignal } : {}),
    ...(sessionNames !== undefined ? { sessionNames } : {}),
  };

  let credentials = baseResult.value;
  const hops = chain.hops();

  for (const [index, hop] of hops.entries()) {
    const position: ChainPosition = { stage: 'hop', index, roleArn: hop.roleArn };

    if (isAborted(abortSignal)) {
      return err(
        withChainPosition(
          createCancelledError(ASSUME_ROLE_PROVIDER_NAME, abortSignal?.reason),
          position,
          index
        )
      );
    }

    const hopResult = await executeHop(hop, credentials, clientConfig, hopOptions);
    if (hopResult.isErr()) {
      logger.debug('hop failed', {
        hop: index + 1,
        roleArn: hop.roleArn,
        code: hopResult.error.code,
      });
      return err(withChainPosition(hopResult.error, position, index));
    }

    logger.debug('assumed role', { hop: index + 1, roleArn: hop.roleArn });
    credentials = hopResult.value;
  }

  return ok(credentials);
};
