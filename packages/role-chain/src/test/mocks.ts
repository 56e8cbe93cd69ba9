/**
 * Mock factories for testing.
 * Provides configurable mock implementations of interfaces.
 */

import { ok, type Result } from 'neverthrow';
import type { Credentials, CredentialsProvider, ProvideCredentialsOptions } from '../types.js';
import type { CredentialsError } from '../errors/types.js';
import type {
  AssumeRoleCall,
  AssumeRoleCallOptions,
  AssumeRoleRequest,
  AssumeRoleResponse,
  AssumeRoleScope,
  TransportError,
} from '../sts/types.js';
import type { LogFields, LogLevel, Logger } from '../logging/types.js';
import { createCredentials, createStsCredentials } from './fixtures.js';

// ============================================================================
// Credentials Provider Mocks
// ============================================================================

/**
 * Creates a mock credentials provider that records each call.
 * Resolves to test credentials attributed to `name` unless a result is given.
 */
export const createMockCredentialsProvider = (
  name: string,
  result: Result<Credentials, CredentialsError> = ok(createCredentials({ providerName: name }))
): CredentialsProvider & { readonly calls: (ProvideCredentialsOptions | undefined)[] } => {
  const calls: (ProvideCredentialsOptions | undefined)[] = [];

  return {
    name,
    calls,
    provideCredentials: (options) => {
      calls.push(options);
      return Promise.resolve(result);
    },
  };
};

// ============================================================================
// AssumeRole Mocks
// ============================================================================

/**
 * One recorded AssumeRole invocation.
 */
export interface RecordedAssumeRole {
  readonly request: AssumeRoleRequest;
  readonly scope: AssumeRoleScope;
  readonly options: AssumeRoleCallOptions | undefined;
}

/**
 * Decides what a recorded call returns. `index` counts calls from zero.
 */
export type AssumeRoleResponder = (
  request: AssumeRoleRequest,
  index: number
) => Result<AssumeRoleResponse, TransportError>;

/** Access key issued by the default responder for a role */
export const issuedAccessKeyFor = (roleArn: string): string => `issued-for-${roleArn}`;

const issueForRole: AssumeRoleResponder = (request) =>
  ok({ Credentials: createStsCredentials({ AccessKeyId: issuedAccessKeyFor(request.roleArn) }) });

/**
 * Creates an AssumeRole call that records every request and tracks how many
 * calls were in flight at once. Each call yields to the event loop before
 * answering, so overlapping calls would be observed.
 */
export const createRecordingAssumeRoleCall = (
  respond: AssumeRoleResponder = issueForRole
): {
  readonly assumeRole: AssumeRoleCall;
  readonly calls: RecordedAssumeRole[];
  readonly maxInFlight: () => number;
} => {
  const calls: RecordedAssumeRole[] = [];
  let inFlight = 0;
  let maxInFlight = 0;

  const assumeRole: AssumeRoleCall = async (request, scope, options) => {
    const index = calls.length;
    calls.push({ request, scope, options });
    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);

    await new Promise<void>((resolve) => setTimeout(resolve, 0));

    inFlight -= 1;
    return respond(request, index);
  };

  return { assumeRole, calls, maxInFlight: () => maxInFlight };
};

// ============================================================================
// Logger Mocks
// ============================================================================

/**
 * A captured log event.
 */
export interface CapturedLogEvent {
  readonly level: LogLevel;
  readonly message: string;
  readonly fields: LogFields | undefined;
}

/**
 * Creates a logger that keeps every event for assertions.
 */
export const createCapturingLogger = (): Logger & { readonly events: CapturedLogEvent[] } => {
  const events: CapturedLogEvent[] = [];
  const capture =
    (level: LogLevel) =>
    (message: string, fields?: LogFields): void => {
      events.push({ level, message, fields });
    };

  return {
    events,
    debug: capture('debug'),
    info: capture('info'),
    warn: capture('warn'),
    error: capture('error'),
  };
};

// ============================================================================
// Timer Mocks
// ============================================================================

/**
 * Fake timer interface for testing time-based logic.
 */
interface FakeTimer {
  now: () => number;
  advance: (ms: number) => void;
  set: (time: number) => void;
}

/**
 * Creates a controllable fake timer for testing time-based logic.
 */
export const createFakeTimer = (initialTime = Date.now()): FakeTimer => {
  let currentTime = initialTime;

  return {
    now: (): number => currentTime,
    advance: (ms: number): void => {
      currentTime += ms;
    },
    set: (time: number): void => {
      currentTime = time;
    },
  };
};
