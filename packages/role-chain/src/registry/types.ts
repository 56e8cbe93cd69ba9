import type { CredentialsProvider } from '../types.js';

/**
 * Read-only mapping from provider name to a shared credentials provider.
 *
 * A miss is reported as `undefined`; the caller decides whether absence is
 * an error.
 */
export interface NamedProviderRegistry {
  /**
   * Looks up a provider by name.
   * @param name - Provider name as referenced by a profile
   * @returns The shared provider or undefined if not registered
   */
  readonly lookup: (name: string) => CredentialsProvider | undefined;

  /**
   * Lists registered names in insertion order.
   */
  readonly names: () => readonly string[];
}

/**
 * Input accepted when building a registry.
 */
export type NamedProviderEntries =
  | ReadonlyMap<string, CredentialsProvider>
  | Readonly<Record<string, CredentialsProvider>>;
