// src/core/L0/Guards.ts
import { ErrorCode, CredentialError } from '../Errors.js';
import { isAddress } from './Crypto.js';
import { MAX_SUBJECT_ID, NULL_ADDRESS } from './Ontology.js';
import type { Address, InstanceLifecycle, SubjectId } from './Ontology.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string, details?: Record<string, unknown>): GuardResult =>
    ({ ok: false, code, violation, ...(details ? { details } : {}) });

/**
 * Throws the guard's failure as a CredentialError.
 */
export function enforce(result: GuardResult): void {
    if (!result.ok) {
        throw new CredentialError(result.code, result.violation, result.details);
    }
}

// --- Concrete Guards ---

// 1. Address shape
export const AddressGuard: Guard<{ value: string, role: string }> = ({ value, role }) => {
    if (!isAddress(value)) return FAIL(ErrorCode.INVALID_ADDRESS, `Malformed ${role} address: ${value}`, { role });
    return OK;
};

// 2. Subject id range
export const SubjectIdGuard: Guard<{ id: SubjectId, role: string }> = ({ id, role }) => {
    if (typeof id !== 'bigint' || id < 0n || id > MAX_SUBJECT_ID) {
        return FAIL(ErrorCode.INVALID_SUBJECT_ID, `${role} id out of range: ${String(id)}`, { role });
    }
    return OK;
};

// 3. Registry binding (never null)
export const RegistryGuard: Guard<{ registry: Address }> = ({ registry }) => {
    if (registry === NULL_ADDRESS) return FAIL(ErrorCode.INVALID_REGISTRY, 'Registry cannot be the null address');
    if (!isAddress(registry)) return FAIL(ErrorCode.INVALID_REGISTRY, `Malformed registry address: ${registry}`);
    return OK;
};

// 4. Owner target (never null)
export const NewOwnerGuard: Guard<{ owner: Address }> = ({ owner }) => {
    if (owner === NULL_ADDRESS || !isAddress(owner)) {
        return FAIL(ErrorCode.INVALID_OWNER, `Invalid owner: ${owner}`);
    }
    return OK;
};

// 5. Ownership (direct equality, not delegated)
export const OwnerGuard: Guard<{ caller: Address, owner: Address }> = ({ caller, owner }) => {
    if (owner === NULL_ADDRESS || caller !== owner) {
        return FAIL(ErrorCode.NOT_OWNER, `Caller ${caller} is not the owner`, { caller });
    }
    return OK;
};

// 6. Initialization
export const InitializableGuard: Guard<{ lifecycle: InstanceLifecycle }> = ({ lifecycle }) => {
    if (lifecycle === 'TEMPLATE') return FAIL(ErrorCode.ALREADY_INITIALIZED, 'Template cannot be initialized');
    if (lifecycle === 'INITIALIZED') return FAIL(ErrorCode.ALREADY_INITIALIZED, 'Instance already initialized');
    return OK;
};

// 7. Salt (32 bytes)
export const SaltGuard: Guard<{ salt: string }> = ({ salt }) => {
    if (!/^(0x)?[0-9a-fA-F]{64}$/.test(salt)) return FAIL(ErrorCode.INVALID_SALT, 'Salt must be 32 bytes of hex');
    return OK;
};
