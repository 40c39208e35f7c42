import Database from 'better-sqlite3';
import type { IEventStore, EventRecord } from '../../core/L5/EventLog.js';
import { encodeEvent, decodeEvent } from '../../core/L5/EventLog.js';

interface EventRow {
    sequence: number;
    recordId: string;
    previousRecordId: string;
    type: string;
    emitter: string;
    payload: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;
    private insertBatch: (records: EventRecord[]) => void;

    constructor(dbPath: string = 'credentials.db') {
        this.db = new Database(dbPath);
        this.initialize(dbPath);

        const insert = this.db.prepare(`
            INSERT INTO credential_events (
                sequence, recordId, previousRecordId, type, emitter, payload
            ) VALUES (
                @sequence, @recordId, @previousRecordId, @type, @emitter, @payload
            )
        `);
        this.insertBatch = this.db.transaction((records: EventRecord[]) => {
            for (const record of records) {
                insert.run({
                    sequence: record.sequence,
                    recordId: record.recordId,
                    previousRecordId: record.previousRecordId,
                    type: record.event.type,
                    emitter: record.event.emitter,
                    payload: encodeEvent(record.event)
                });
            }
        });
    }

    private initialize(dbPath: string) {
        if (dbPath !== ':memory:') this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS credential_events (
                sequence INTEGER PRIMARY KEY,
                recordId TEXT UNIQUE NOT NULL,
                previousRecordId TEXT NOT NULL,
                type TEXT NOT NULL,
                emitter TEXT NOT NULL,
                payload TEXT NOT NULL
            );
            CREATE INDEX IF NOT EXISTS credential_events_emitter ON credential_events (emitter, type);
        `);
    }

    append(records: EventRecord[]): void {
        this.insertBatch(records);
    }

    getHistory(): EventRecord[] {
        const rows = this.db
            .prepare<[], EventRow>('SELECT * FROM credential_events ORDER BY sequence ASC')
            .all();
        return rows.map(mapRowToRecord);
    }

    getLatest(): EventRecord | null {
        const row = this.db
            .prepare<[], EventRow>('SELECT * FROM credential_events ORDER BY sequence DESC LIMIT 1')
            .get();
        return row ? mapRowToRecord(row) : null;
    }

    /**
     * Records emitted by one address, oldest first.
     */
    getByEmitter(emitter: string): EventRecord[] {
        const rows = this.db
            .prepare<[string], EventRow>('SELECT * FROM credential_events WHERE emitter = ? ORDER BY sequence ASC')
            .all(emitter);
        return rows.map(mapRowToRecord);
    }

    public close() {
        this.db.close();
    }
}

function mapRowToRecord(row: EventRow): EventRecord {
    return {
        sequence: row.sequence,
        recordId: row.recordId,
        previousRecordId: row.previousRecordId,
        event: decodeEvent(row.payload)
    };
}
