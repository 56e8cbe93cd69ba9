/**
 * Client configuration module.
 *
 * @packageDocumentation
 */

export { createClientConfiguration, RegionSchema } from './config.js';
export type { ClientConfigurationOptions } from './config.js';
