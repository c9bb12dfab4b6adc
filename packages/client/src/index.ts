export { SchemaRegistryClient } from './client';
export type { SchemaRegistryClientOptions, RegistryMode, CompatibilityConfig } from './client';
export { RegistryRequestError } from './errors';
