/**
 * Attested credential instances: namespaced storage, registry-delegated
 * authorization and a template/clone instance factory.
 */

export { ErrorCode, CredentialError, isCredentialError } from './core/Errors.js';

// L0 Primitives
export * from './core/L0/Ontology.js';
export {
    hash, hashBytes, canonicalize, utf8, fromUtf8, toHex, fromHex,
    isAddress, addressFromDigest, addressFromPublicKey, generateActor
} from './core/L0/Crypto.js';
export type { Actor } from './core/L0/Crypto.js';
export { DEFAULT_CONFIG, resolveConfig } from './core/L0/Config.js';
export type { CredentialConfig, Logger } from './core/L0/Config.js';
export type { GuardResult, Guard } from './core/L0/Guards.js';
export { Substrate, computeDeterministicAddress, normalizeSalt } from './core/L0/Substrate.js';
export type { Deployment } from './core/L0/Substrate.js';

// L1 Storage & Authorization
export {
    NamespacedStore, namespaceId, assertDisjoint, SUBJECT_METADATA, INSTANCE_METADATA, REVIEWS
} from './core/L1/NamespacedStore.js';
export type { SlotChange } from './core/L1/NamespacedStore.js';
export { AuthorizationGate } from './core/L1/Authorization.js';
export type {
    SubjectRegistry, AuthorizationOutcome, AuthorizationBasis, AuthorizationDecision
} from './core/L1/Authorization.js';
export { MemorySubjectRegistry } from './core/L1/MemorySubjectRegistry.js';

// L2 Instances
export { CredentialInstance, NAME_KEY } from './core/L2/CredentialInstance.js';
export type { CloneInit, DirectDeployOptions, MetadataEntryInput } from './core/L2/CredentialInstance.js';
export { INTERFACE_IDS, INTERFACE_SIGNATURES, interfaceId, selector, isSupportedInterface } from './core/L2/Interfaces.js';
export type { InterfaceName } from './core/L2/Interfaces.js';

// L3 Factory
export { InstanceFactory, cloneCodeHash } from './core/L3/InstanceFactory.js';

// L5 Notifications
export { EventLog, GENESIS_RECORD_ID, encodeEvent, decodeEvent } from './core/L5/EventLog.js';
export type { IEventStore, EventRecord, EventListener } from './core/L5/EventLog.js';

// Infrastructure
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
