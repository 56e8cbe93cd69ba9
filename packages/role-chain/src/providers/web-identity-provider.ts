import { fromTokenFile } from '@aws-sdk/credential-providers';
import type { CredentialsProvider } from '../types.js';
import { fromIdentityProvider } from './identity-provider.js';

/** Provider name attached to web identity credentials */
export const WEB_IDENTITY_PROVIDER_NAME = 'WebIdentityToken';

/**
 * Static configuration for a web identity token provider.
 */
export interface WebIdentityTokenRole {
  /** Role to assume with the token */
  readonly roleArn: string;
  /** Path of the file holding the OIDC token */
  readonly webIdentityTokenFile: string;
  /** Role session name (already defaulted by the caller) */
  readonly sessionName: string;
  /** Region for the STS call */
  readonly region?: string | undefined;
}

/**
 * Factory matching `fromTokenFile`, injectable for tests.
 */
export type TokenFileProviderFactory = typeof fromTokenFile;

/**
 * Creates a provider that exchanges a web identity token file for credentials.
 *
 * Construction does no I/O; the token file is read and STS is called when
 * credentials are requested.
 *
 * @param role - Role, token file and session name
 * @param createTokenFileProvider - Factory for the underlying SDK provider
 * @returns A CredentialsProvider instance
 */
export const createWebIdentityTokenProvider = (
  role: WebIdentityTokenRole,
  createTokenFileProvider: TokenFileProviderFactory = fromTokenFile
): CredentialsProvider =>
  fromIdentityProvider(
    WEB_IDENTITY_PROVIDER_NAME,
    createTokenFileProvider({
      webIdentityTokenFile: role.webIdentityTokenFile,
      roleArn: role.roleArn,
      roleSessionName: role.sessionName,
      ...(role.region !== undefined ? { clientConfig: { region: role.region } } : {}),
    })
  );
