import { DEFAULT_REGISTRY_ADDRESS } from './Ontology.js';
import type { Address } from './Ontology.js';
import { RegistryGuard, enforce } from './Guards.js';

export type Logger = Pick<Console, 'debug' | 'info' | 'warn'>;

export interface CredentialConfig {
    /** Registry bound whenever a caller supplies the null address. */
    defaultRegistry: Address;
    logger: Logger;
}

export const DEFAULT_CONFIG: Readonly<CredentialConfig> = Object.freeze({
    defaultRegistry: DEFAULT_REGISTRY_ADDRESS,
    logger: console
});

export function resolveConfig(overrides: Partial<CredentialConfig> = {}): CredentialConfig {
    const config: CredentialConfig = { ...DEFAULT_CONFIG, ...overrides };
    enforce(RegistryGuard({ registry: config.defaultRegistry }));
    return config;
}
