/**
 * Default role session names.
 *
 * A session name that the profile leaves out is derived from a fixed purpose
 * tag plus a millisecond timestamp. All defaulting goes through a
 * SessionNameGenerator so callers can pin the clock.
 *
 * @packageDocumentation
 */

/** Purpose tag for hops declared in a profile chain */
export const ASSUME_ROLE_FROM_PROFILE = 'assume-role-from-profile';

/** Purpose tag for a web identity token base provider */
export const WEB_IDENTITY_TOKEN_PROFILE = 'web-identity-token-profile';

/**
 * Known purpose tags.
 */
export type SessionNamePurpose = typeof ASSUME_ROLE_FROM_PROFILE | typeof WEB_IDENTITY_TOKEN_PROFILE;

/**
 * Produces a session name for a purpose.
 */
export type SessionNameGenerator = (purpose: SessionNamePurpose) => string;

/**
 * Creates a session name generator backed by a clock.
 *
 * @param now - Clock returning epoch milliseconds (default: wall clock)
 * @returns A generator yielding "<purpose>-<millis>"
 *
 * @example
 * ```typescript
 * const generate = createSessionNameGenerator(() => 1700000000000);
 * generate(ASSUME_ROLE_FROM_PROFILE); // "assume-role-from-profile-1700000000000"
 * ```
 */
export const createSessionNameGenerator =
  (now: () => number = () => Date.now()): SessionNameGenerator =>
  (purpose) =>
    `${purpose}-${String(now())}`;

/**
 * Generates a session name from the wall clock.
 */
export const defaultSessionName: SessionNameGenerator = createSessionNameGenerator();
