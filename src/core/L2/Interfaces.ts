// src/core/L2/Interfaces.ts
import { hash } from '../L0/Crypto.js';

/**
 * 4-byte selector of an operation signature, as 8 hex digits.
 */
export function selector(signature: string): string {
    return hash(signature).slice(0, 8);
}

/**
 * Interface id: XOR of the selectors of every operation it declares.
 */
export function interfaceId(signatures: readonly string[]): string {
    let acc = 0;
    for (const sig of signatures) {
        acc = (acc ^ parseInt(selector(sig), 16)) >>> 0;
    }
    return acc.toString(16).padStart(8, '0');
}

export const INTERFACE_SIGNATURES = {
    ICapabilityIntrospection: [
        'supportsInterface(interfaceId)'
    ],
    ISubjectMetadata: [
        'setSubjectMetadata(subjectId,key,value)',
        'getSubjectMetadata(subjectId,key)'
    ],
    IInstanceMetadata: [
        'setInstanceMetadata(key,value)',
        'getInstanceMetadata(key)'
    ],
    IReviews: [
        'submitReview(reviewerId,reviewedId,data)',
        'getReview(reviewerId,reviewedId)'
    ],
    ICredentialInstance: [
        'initialize(registry,owner,displayName)',
        'registry()',
        'setRegistry(registry)',
        'owner()',
        'transferOwnership(newOwner)',
        'renounceOwnership()'
    ]
} as const;

export type InterfaceName = keyof typeof INTERFACE_SIGNATURES;

export const INTERFACE_IDS: Readonly<Record<InterfaceName, string>> = Object.freeze({
    ICapabilityIntrospection: interfaceId(INTERFACE_SIGNATURES.ICapabilityIntrospection),
    ISubjectMetadata: interfaceId(INTERFACE_SIGNATURES.ISubjectMetadata),
    IInstanceMetadata: interfaceId(INTERFACE_SIGNATURES.IInstanceMetadata),
    IReviews: interfaceId(INTERFACE_SIGNATURES.IReviews),
    ICredentialInstance: interfaceId(INTERFACE_SIGNATURES.ICredentialInstance)
});

const SUPPORTED = new Set<string>(Object.values(INTERFACE_IDS));

/**
 * Unknown or malformed ids answer false; this never throws.
 */
export function isSupportedInterface(id: string): boolean {
    const normalized = id.replace(/^0x/i, '').toLowerCase();
    if (!/^[0-9a-f]{8}$/.test(normalized) || normalized === 'ffffffff') return false;
    return SUPPORTED.has(normalized);
}
