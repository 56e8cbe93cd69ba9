/**
 * Shared test fixtures and constants.
 * Placeholder credentials only; nothing here is a real key.
 */

import type { Credentials } from '../types.js';
import type { StsCredentials } from '../sts/types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * 60 * 1000;

/** Fixed clock reading for deterministic session names */
export const FIXED_NOW_MS = 1_700_000_000_000;

/** Expiration attached to temporary test credentials */
export const TEST_EXPIRATION = new Date(FIXED_NOW_MS + ONE_HOUR_MS);

// ============================================================================
// Credentials
// ============================================================================

export const TEST_ACCESS_KEY_ID = 'test-access-key-id';
export const TEST_SECRET_ACCESS_KEY = 'test-secret';
export const TEST_SESSION_TOKEN = 'test-session-token';

// ============================================================================
// Roles and Configuration
// ============================================================================

export const TEST_ROLE_ARN_A = 'arn:aws:iam::111111111111:role/A';
export const TEST_ROLE_ARN_B = 'arn:aws:iam::222222222222:role/B';
export const TEST_EXTERNAL_ID = 'eid';
export const TEST_TOKEN_FILE = '/var/run/secrets/test/token';
export const TEST_REGION = 'us-east-1';

// ============================================================================
// Builders
// ============================================================================

/**
 * Creates temporary credentials as a provider would return them.
 */
export const createCredentials = (overrides: Partial<Credentials> = {}): Credentials => ({
  accessKeyId: TEST_ACCESS_KEY_ID,
  secretAccessKey: TEST_SECRET_ACCESS_KEY,
  sessionToken: TEST_SESSION_TOKEN,
  expiration: TEST_EXPIRATION,
  providerName: 'TestProvider',
  ...overrides,
});

/**
 * Creates the `Credentials` member of an STS response.
 */
export const createStsCredentials = (overrides: Partial<StsCredentials> = {}): StsCredentials => ({
  AccessKeyId: TEST_ACCESS_KEY_ID,
  SecretAccessKey: TEST_SECRET_ACCESS_KEY,
  SessionToken: TEST_SESSION_TOKEN,
  Expiration: TEST_EXPIRATION,
  ...overrides,
});
