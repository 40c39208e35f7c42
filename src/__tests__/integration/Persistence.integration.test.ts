import { describe, test, expect, afterEach, beforeEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SQLiteEventStore } from '../../infrastructure/persistence/SQLiteEventStore.js';
import { EventLog } from '../../core/L5/EventLog.js';
import { NULL_ADDRESS } from '../../core/L0/Ontology.js';
import { utf8 } from '../../core/L0/Crypto.js';
import { addr, instanceAt, quietLogger, setupFactory, setupWorld } from '../support/fixtures.js';

describe('SQLite Persistence Integration', () => {
    let dir: string;
    let dbPath: string;
    const open: SQLiteEventStore[] = [];

    const openStore = (): SQLiteEventStore => {
        const store = new SQLiteEventStore(dbPath);
        open.push(store);
        return store;
    };

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'credential-events-'));
        dbPath = path.join(dir, 'events.db');
    });

    afterEach(() => {
        for (const store of open.splice(0)) store.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('persists every transition of a factory-created instance', () => {
        const store = openStore();
        const world = setupWorld(new EventLog(store, quietLogger()));
        const factory = setupFactory(world);
        const alice = addr('alice');
        const subject = world.registry.mint(alice);

        const instance = instanceAt(world, factory.create(alice, NULL_ADDRESS, 'Widget'));
        instance.setSubjectMetadata(alice, subject, 'k', utf8('v1'));

        const history = store.getHistory();
        expect(history.map((r) => r.event.type)).toEqual([
            'OwnershipTransferred', 'MetadataSet', 'InstanceCreated', 'MetadataSet'
        ]);
        expect(history[3]?.event).toEqual({
            type: 'MetadataSet', emitter: instance.address, subjectId: subject, key: 'k', value: utf8('v1')
        });
        expect(store.getLatest()?.sequence).toBe(3);
        expect(world.substrate.events.verifyChain()).toBe(true);
    });

    test('a reopened store continues the chain', () => {
        const first = new EventLog(openStore(), quietLogger());
        const a = first.append({ type: 'OwnershipTransferred', emitter: addr('i'), previousOwner: NULL_ADDRESS, newOwner: addr('o') });

        const second = new EventLog(openStore(), quietLogger());
        const b = second.append({ type: 'RegistryUpdated', emitter: addr('i'), previousRegistry: addr('r1'), newRegistry: addr('r2') });

        expect(b.sequence).toBe(1);
        expect(b.previousRecordId).toBe(a.recordId);
        expect(second.verifyChain()).toBe(true);
    });

    test('indexes records by emitter', () => {
        const store = openStore();
        const log = new EventLog(store, quietLogger());
        log.appendAll([
            { type: 'OwnershipTransferred', emitter: addr('one'), previousOwner: NULL_ADDRESS, newOwner: addr('o') },
            { type: 'OwnershipTransferred', emitter: addr('two'), previousOwner: NULL_ADDRESS, newOwner: addr('o') },
            { type: 'ReviewSubmitted', emitter: addr('one'), reviewerId: 1n, reviewedId: 2n, data: utf8('great') }
        ]);

        expect(store.getByEmitter(addr('one')).map((r) => r.sequence)).toEqual([0, 2]);
        expect(store.getByEmitter(addr('nobody'))).toEqual([]);
    });

    test('a duplicate sequence rolls back the whole batch', () => {
        const store = new SQLiteEventStore(':memory:');
        open.push(store);
        const log = new EventLog(store, quietLogger());
        const [record] = log.appendAll([
            { type: 'OwnershipTransferred', emitter: addr('i'), previousOwner: NULL_ADDRESS, newOwner: addr('o') }
        ]);
        if (!record) throw new Error('no record');

        const fresh = { ...record, recordId: 'f'.repeat(64) };
        expect(() => store.append([{ ...fresh, sequence: 1 }, fresh])).toThrow();
        expect(store.getHistory()).toHaveLength(1);
    });
});
