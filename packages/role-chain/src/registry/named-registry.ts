import type { CredentialsProvider } from '../types.js';
import type { NamedProviderEntries, NamedProviderRegistry } from './types.js';

const isProviderMap = (
  providers: NamedProviderEntries
): providers is ReadonlyMap<string, CredentialsProvider> => providers instanceof Map;

const toEntries = (providers: NamedProviderEntries): [string, CredentialsProvider][] =>
  isProviderMap(providers) ? [...providers.entries()] : Object.entries(providers);

/**
 * Creates a read-only provider registry.
 *
 * The mapping is copied, so later changes to the caller's map or object
 * are not visible through the registry.
 *
 * @param providers - Name to provider mapping
 * @returns A NamedProviderRegistry instance
 *
 * @example
 * ```typescript
 * const registry = createNamedProviderRegistry({
 *   Environment: fromIdentityProvider('Environment', fromEnv()),
 * });
 * registry.lookup('Environment'); // provider
 * registry.lookup('floozle');     // undefined
 * ```
 */
export const createNamedProviderRegistry = (
  providers: NamedProviderEntries = {}
): NamedProviderRegistry => {
  const store: ReadonlyMap<string, CredentialsProvider> = new Map(toEntries(providers));
  const names = Object.freeze([...store.keys()]);

  return Object.freeze({
    lookup: (name: string): CredentialsProvider | undefined => store.get(name),
    names: (): readonly string[] => names,
  });
};
