// src/core/L5/EventLog.ts
import { hash, canonicalize, toHex, fromHex, isAddress } from '../L0/Crypto.js';
import type { Address, CredentialEvent, CredentialEventType } from '../L0/Ontology.js';
import type { Logger } from '../L0/Config.js';
import { ErrorCode, CredentialError } from '../Errors.js';

/**
 * Event Store Port
 * Persists the notification chain for off-path indexers.
 */
export interface IEventStore {
    append(records: EventRecord[]): void;
    getHistory(): EventRecord[];
    getLatest(): EventRecord | null;
}

// --- Notification record (the indexer-facing substrate) ---
export interface EventRecord {
    sequence: number;
    recordId: string; // identifying hash
    previousRecordId: string; // chain linkage
    event: CredentialEvent;
}

export type EventListener = (record: EventRecord) => void;

export const GENESIS_RECORD_ID = '0000000000000000000000000000000000000000000000000000000000000000';

export class EventLog {
    private localChain: EventRecord[] = [];
    private listeners: Set<EventListener> = new Set();

    constructor(private store?: IEventStore, private logger: Logger = console) { }

    /**
     * Appends a batch of notifications as one unit: either every record
     * reaches the store or none does.
     */
    public appendAll(events: CredentialEvent[]): EventRecord[] {
        if (events.length === 0) return [];

        const tip = this.getTip();
        let previous = tip ? tip.recordId : GENESIS_RECORD_ID;
        let sequence = tip ? tip.sequence + 1 : 0;

        const records: EventRecord[] = [];
        for (const event of events) {
            const record: EventRecord = Object.freeze({
                sequence,
                recordId: this.calculateHash(previous, sequence, event),
                previousRecordId: previous,
                event
            });
            records.push(record);
            previous = record.recordId;
            sequence++;
        }

        if (this.store) {
            try {
                this.store.append(records);
            } catch (e) {
                const reason = e instanceof Error ? e.message : String(e);
                this.logger.warn(`[EventLog] Store append failed: ${reason}`);
                throw new CredentialError(ErrorCode.EVENT_STORE_FAILURE, `Event store rejected ${records.length} record(s): ${reason}`);
            }
        }

        this.localChain.push(...records);
        for (const record of records) this.notify(record);
        return records;
    }

    public append(event: CredentialEvent): EventRecord {
        const [record] = this.appendAll([event]);
        if (!record) throw new CredentialError(ErrorCode.EVENT_STORE_FAILURE, 'Append produced no record');
        return record;
    }

    public getHistory(): EventRecord[] {
        if (this.store) return this.store.getHistory();
        return [...this.localChain];
    }

    public filter<T extends CredentialEventType>(type: T): Extract<CredentialEvent, { type: T }>[] {
        const out: Extract<CredentialEvent, { type: T }>[] = [];
        for (const record of this.getHistory()) {
            const event = record.event;
            if (isEventOfType(event, type)) out.push(event);
        }
        return out;
    }

    public getTip(): EventRecord | null {
        if (this.localChain.length > 0) return this.localChain[this.localChain.length - 1] ?? null;
        if (this.store) return this.store.getLatest();
        return null;
    }

    public verifyChain(): boolean {
        let prev = GENESIS_RECORD_ID;
        let expectedSequence = 0;

        for (const record of this.getHistory()) {
            if (record.previousRecordId !== prev) return false;
            if (record.sequence !== expectedSequence) return false;
            if (this.calculateHash(prev, record.sequence, record.event) !== record.recordId) return false;
            prev = record.recordId;
            expectedSequence++;
        }
        return true;
    }

    public subscribe(listener: EventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private notify(record: EventRecord): void {
        for (const listener of this.listeners) {
            try {
                listener(record);
            } catch (e) {
                // listeners observe, they cannot veto a committed transition
                this.logger.warn(`[EventLog] Listener failed on record ${record.sequence}: ${e instanceof Error ? e.message : String(e)}`);
            }
        }
    }

    private calculateHash(previous: string, sequence: number, event: CredentialEvent): string {
        return hash(canonicalize([previous, sequence, canonicalize(event)]));
    }
}

function isEventOfType<T extends CredentialEventType>(
    event: CredentialEvent,
    type: T
): event is Extract<CredentialEvent, { type: T }> {
    return event.type === type;
}

// --- Wire form (for stores) ---
// bigint -> decimal string, bytes -> 0x hex, null stays null.

export function encodeEvent(event: CredentialEvent): string {
    switch (event.type) {
        case 'MetadataSet':
            return JSON.stringify({
                ...event,
                subjectId: event.subjectId === null ? null : event.subjectId.toString(),
                value: `0x${toHex(event.value)}`
            });
        case 'ReviewSubmitted':
            return JSON.stringify({
                ...event,
                reviewerId: event.reviewerId.toString(),
                reviewedId: event.reviewedId.toString(),
                data: `0x${toHex(event.data)}`
            });
        case 'OwnershipTransferred':
        case 'RegistryUpdated':
        case 'InstanceCreated':
            return JSON.stringify(event);
    }
}

export function decodeEvent(json: string): CredentialEvent {
    const raw: unknown = JSON.parse(json);
    if (typeof raw !== 'object' || raw === null) throw malformed('not an object');
    const fields = new Map<string, unknown>(Object.entries(raw));
    const field = (name: string): unknown => fields.get(name);

    const str = (name: string): string => {
        const v = field(name);
        if (typeof v !== 'string') throw malformed(`field ${name}`);
        return v;
    };
    const addr = (name: string): Address => {
        const v = str(name);
        if (!isAddress(v)) throw malformed(`field ${name}`);
        return v;
    };

    const type = str('type');
    const emitter = addr('emitter');
    switch (type) {
        case 'MetadataSet': {
            const subject = field('subjectId');
            return {
                type, emitter,
                subjectId: subject === null ? null : BigInt(str('subjectId')),
                key: str('key'),
                value: fromHex(str('value'))
            };
        }
        case 'ReviewSubmitted':
            return {
                type, emitter,
                reviewerId: BigInt(str('reviewerId')),
                reviewedId: BigInt(str('reviewedId')),
                data: fromHex(str('data'))
            };
        case 'OwnershipTransferred':
            return { type, emitter, previousOwner: addr('previousOwner'), newOwner: addr('newOwner') };
        case 'RegistryUpdated':
            return { type, emitter, previousRegistry: addr('previousRegistry'), newRegistry: addr('newRegistry') };
        case 'InstanceCreated':
            return {
                type, emitter,
                instance: addr('instance'),
                registry: addr('registry'),
                name: str('name'),
                creator: addr('creator')
            };
        default:
            throw malformed(`unknown type ${type}`);
    }
}

function malformed(detail: string): CredentialError {
    return new CredentialError(ErrorCode.EVENT_STORE_FAILURE, `Malformed stored event: ${detail}`);
}
