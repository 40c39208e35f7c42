/**
 * CREDENTIAL ONTOLOGY
 * The single source of truth for the primitives every stratum shares.
 */

// --- 1. Address ---
// 0x-prefixed, 40 lowercase hex digits.
export type Address = `0x${string}`;

export const NULL_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

// Well-known address substituted whenever a caller supplies the null registry.
export const DEFAULT_REGISTRY_ADDRESS: Address = '0x8004000000000000000000000000000000000001';

// --- 2. Subject ---
export type SubjectId = bigint;

export const MAX_SUBJECT_ID: SubjectId = (1n << 256n) - 1n;

// --- 3. Namespace ---
export type NamespaceId = string; // sha256 hex of the domain string

// Physical storage owned by a single instance: slot -> hex-encoded value.
export type SlotMap = Record<string, string>;

// --- 4. Instance Lifecycle ---
export type InstanceLifecycle =
    | 'TEMPLATE'        // shared logic body, permanently barred from initialization
    | 'UNINITIALIZED'   // freshly cloned
    | 'INITIALIZED';    // terminal

// --- 5. Deployed Kinds ---
export type DeployedKind = 'INSTANCE' | 'FACTORY' | 'REGISTRY';

// --- 6. Notifications ---
export interface MetadataSet {
    type: 'MetadataSet';
    emitter: Address;
    subjectId: SubjectId | null; // null for instance-scoped metadata
    key: string;
    value: Uint8Array;
}

export interface ReviewSubmitted {
    type: 'ReviewSubmitted';
    emitter: Address;
    reviewerId: SubjectId;
    reviewedId: SubjectId;
    data: Uint8Array;
}

export interface OwnershipTransferred {
    type: 'OwnershipTransferred';
    emitter: Address;
    previousOwner: Address;
    newOwner: Address;
}

export interface RegistryUpdated {
    type: 'RegistryUpdated';
    emitter: Address;
    previousRegistry: Address;
    newRegistry: Address;
}

export interface InstanceCreated {
    type: 'InstanceCreated';
    emitter: Address;
    instance: Address;
    registry: Address;
    name: string;
    creator: Address;
}

export type CredentialEvent =
    | MetadataSet
    | ReviewSubmitted
    | OwnershipTransferred
    | RegistryUpdated
    | InstanceCreated;

export type CredentialEventType = CredentialEvent['type'];
