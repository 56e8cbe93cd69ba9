/**
 * Base credential providers.
 *
 * @packageDocumentation
 */

export { createStaticCredentialsProvider, STATIC_PROVIDER_NAME } from './static-provider.js';
export type { StaticKeyPair } from './static-provider.js';

export { fromIdentityProvider } from './identity-provider.js';

export {
  createWebIdentityTokenProvider,
  WEB_IDENTITY_PROVIDER_NAME,
} from './web-identity-provider.js';
export type { WebIdentityTokenRole, TokenFileProviderFactory } from './web-identity-provider.js';
