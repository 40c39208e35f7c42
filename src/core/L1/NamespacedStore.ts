// src/core/L1/NamespacedStore.ts
import { hash, toHex, fromHex } from '../L0/Crypto.js';
import { ErrorCode, CredentialError } from '../Errors.js';
import type { NamespaceId, SlotMap, SubjectId } from '../L0/Ontology.js';

const SEPARATOR = '\u001f';

/**
 * Region identifier for a domain string. Depends on nothing but the string,
 * so every instance running the shared logic finds the same region.
 */
export function namespaceId(domain: string): NamespaceId {
    return hash(domain);
}

export interface SlotChange<K> {
    region: NamespaceId;
    slot: string;
    key: K;
    value: Uint8Array;
}

/**
 * Isolated key/value region inside an instance's slot map.
 *
 * The store itself is stateless: it only knows how to locate its region.
 * Each instance passes its own SlotMap, which is what keeps instances
 * sharing one store definition apart.
 */
export class NamespacedStore<K> {
    public readonly region: NamespaceId;

    constructor(
        public readonly domain: string,
        private readonly encodeKey: (key: K) => string[]
    ) {
        this.region = namespaceId(domain);
    }

    public slotOf(key: K): string {
        return hash([this.region, ...this.encodeKey(key)].join(SEPARATOR));
    }

    /** Zero-length bytes when the key was never written. */
    public get(storage: Readonly<SlotMap>, key: K): Uint8Array {
        const stored = storage[this.slotOf(key)];
        return stored === undefined ? new Uint8Array(0) : fromHex(stored);
    }

    /**
     * Unconditional overwrite. Returns the change so the caller can emit it.
     */
    public set(storage: SlotMap, key: K, value: Uint8Array): SlotChange<K> {
        const slot = this.slotOf(key);
        storage[slot] = toHex(value);
        return { region: this.region, slot, key, value: Uint8Array.from(value) };
    }
}

/**
 * Fails when two stores would share a region.
 */
export function assertDisjoint(stores: ReadonlyArray<{ domain: string; region: NamespaceId }>): void {
    const seen = new Map<NamespaceId, string>();
    for (const store of stores) {
        const existing = seen.get(store.region);
        if (existing !== undefined) {
            throw new CredentialError(
                ErrorCode.NAMESPACE_COLLISION,
                `Namespace "${store.domain}" collides with "${existing}"`,
                { region: store.region }
            );
        }
        seen.set(store.region, store.domain);
    }
}

// --- Credential Regions ---

export const SUBJECT_METADATA = new NamespacedStore<{ subjectId: SubjectId; key: string }>(
    'credential.subject-metadata.v1',
    ({ subjectId, key }) => [subjectId.toString(), key]
);

export const INSTANCE_METADATA = new NamespacedStore<string>(
    'credential.instance-metadata.v1',
    (key) => [key]
);

export const REVIEWS = new NamespacedStore<{ reviewerId: SubjectId; reviewedId: SubjectId }>(
    'credential.reviews.v1',
    ({ reviewerId, reviewedId }) => [reviewerId.toString(), reviewedId.toString()]
);

assertDisjoint([SUBJECT_METADATA, INSTANCE_METADATA, REVIEWS]);
