/**
 * Client configuration for chain execution.
 *
 * Values are resolved with priority: options > environment > defaults.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { AssumeRoleCall } from '../sts/types.js';
import { createStsAssumeRoleCall } from '../sts/sts-client.js';
import type { ClientConfiguration } from '../chain/types.js';

/** Lowercase region identifier such as "us-east-1" or "us-gov-west-1" */
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

export const RegionSchema = z.string().regex(REGION_PATTERN, 'Invalid region format');

/**
 * Options for creating a client configuration.
 * All fields are optional; defaults come from the environment.
 */
export interface ClientConfigurationOptions {
  /** Override region (default: AWS_REGION, then AWS_DEFAULT_REGION env var) */
  readonly region?: string;
  /** Override the AssumeRole call (default: STS through the AWS SDK) */
  readonly assumeRole?: AssumeRoleCall;
}

const fromEnv = (name: string): string | undefined => {
  const value = process.env[name];
  return value !== undefined && value !== '' ? value : undefined;
};

/**
 * Creates the configuration every hop of a chain runs with.
 *
 * @param options - Optional overrides for configuration values
 * @returns Client configuration
 * @throws Error if the resolved region is malformed
 *
 * @example
 * ```typescript
 * // Region from AWS_REGION / AWS_DEFAULT_REGION, STS through the AWS SDK
 * const config = createClientConfiguration();
 *
 * // Explicit region and a custom AssumeRole call
 * const config = createClientConfiguration({ region: 'eu-west-1', assumeRole });
 * ```
 */
export function createClientConfiguration(
  options: ClientConfigurationOptions = {}
): ClientConfiguration {
  const region = options.region ?? fromEnv('AWS_REGION') ?? fromEnv('AWS_DEFAULT_REGION');
  const assumeRole = options.assumeRole ?? createStsAssumeRoleCall();

  if (region === undefined) {
    return { assumeRole };
  }

  const parsed = RegionSchema.safeParse(region);
  if (!parsed.success) {
    throw new Error(
      `Invalid region "${region}". Provide via options.region, AWS_REGION or AWS_DEFAULT_REGION, e.g. us-east-1.`
    );
  }

  return { assumeRole, region: parsed.data };
}
