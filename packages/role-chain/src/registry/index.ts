/**
 * Named provider registry module.
 *
 * @packageDocumentation
 */

export type { NamedProviderRegistry, NamedProviderEntries } from './types.js';

export { createNamedProviderRegistry } from './named-registry.js';

export {
  createDefaultNamedProviderRegistry,
  ENVIRONMENT_SOURCE,
  EC2_INSTANCE_METADATA_SOURCE,
  ECS_CONTAINER_SOURCE,
} from './default-registry.js';
export type { DefaultNamedProvidersOptions } from './default-registry.js';
