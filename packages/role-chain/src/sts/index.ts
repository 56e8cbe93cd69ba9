/**
 * AssumeRole call boundary.
 *
 * @packageDocumentation
 */

export type {
  StsCredentials,
  AssumeRoleRequest,
  AssumeRoleScope,
  AssumeRoleCallOptions,
  AssumeRoleResponse,
  TransportError,
  AssumeRoleCall,
} from './types.js';

export { intoCredentials } from './into-credentials.js';

export { createStsAssumeRoleCall, toTransportError } from './sts-client.js';
export type { StsSender, StsClientFactory, StsAssumeRoleCallOptions } from './sts-client.js';
