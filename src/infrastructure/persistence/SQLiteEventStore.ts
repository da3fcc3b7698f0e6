import Database from 'better-sqlite3';
import { isAddress } from 'viem';
import { canonicalize } from '../../kernel-core/L0/Crypto.js';
import type { AccountEvent, EventRecord, IEventStore } from '../../kernel-core/L5/Audit.js';
import type { Subscription } from '../../kernel-core/L2/State.js';

interface EventRow {
    sequence: number;
    eventId: string;
    previousEventId: string;
    type: string;
    timestamp: string;
    payload: string;
}

interface SubscriptionRow {
    id: string;
    beneficiary: string;
    token: string;
    amount: string;
    nextExecuteAt: string;
    interval: string;
    active: number;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'account-events.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS account_events (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                eventId TEXT UNIQUE NOT NULL,
                previousEventId TEXT NOT NULL,
                type TEXT NOT NULL,
                timestamp TEXT NOT NULL,
                payload TEXT NOT NULL
            );
            CREATE TABLE IF NOT EXISTS subscriptions (
                id TEXT PRIMARY KEY,
                beneficiary TEXT NOT NULL,
                token TEXT NOT NULL,
                amount TEXT NOT NULL,
                nextExecuteAt TEXT NOT NULL,
                interval TEXT NOT NULL,
                active INTEGER NOT NULL
            )
        `);
    }

    async append(record: EventRecord, subscription: Subscription): Promise<void> {
        const insertEvent = this.db.prepare(`
            INSERT INTO account_events (
                eventId, previousEventId, type, timestamp, payload
            ) VALUES (
                ?, ?, ?, ?, ?
            )
        `);
        const upsertSubscription = this.db.prepare(`
            INSERT INTO subscriptions (id, beneficiary, token, amount, nextExecuteAt, interval, active)
            VALUES (?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT(id) DO UPDATE SET nextExecuteAt = excluded.nextExecuteAt, active = excluded.active
        `);

        // Event and registry row land together or not at all
        this.db.transaction(() => {
            insertEvent.run(
                record.eventId,
                record.previousEventId,
                record.event.type,
                record.timestamp.toString(),
                canonicalize(record.event)
            );
            upsertSubscription.run(
                subscription.id.toString(),
                subscription.beneficiary,
                subscription.token,
                subscription.amount.toString(),
                subscription.nextExecuteAt.toString(),
                subscription.interval.toString(),
                subscription.active ? 1 : 0
            );
        })();
    }

    async getSubscriptions(): Promise<Subscription[]> {
        const stmt = this.db.prepare<[], SubscriptionRow>('SELECT * FROM subscriptions');
        return stmt.all()
            .map(row => reviveSubscription(row))
            .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }

    async getHistory(): Promise<EventRecord[]> {
        const stmt = this.db.prepare<[], EventRow>('SELECT * FROM account_events ORDER BY sequence ASC');
        const rows = stmt.all();

        return rows.map(row => this.mapRowToRecord(row));
    }

    async getLatest(): Promise<EventRecord | null> {
        const stmt = this.db.prepare<[], EventRow>('SELECT * FROM account_events ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToRecord(row);
    }

    private mapRowToRecord(row: EventRow): EventRecord {
        return {
            eventId: row.eventId,
            previousEventId: row.previousEventId,
            event: reviveEvent(row.type, JSON.parse(row.payload)),
            timestamp: BigInt(row.timestamp)
        };
    }

    public close() {
        this.db.close();
    }
}

function reviveSubscription(row: SubscriptionRow): Subscription {
    const { beneficiary, token } = row;
    if (!isAddress(beneficiary, { strict: false })) throw new Error(`SQLiteEventStore: malformed beneficiary ${beneficiary}`);
    if (!isAddress(token, { strict: false })) throw new Error(`SQLiteEventStore: malformed token ${token}`);
    return {
        id: BigInt(row.id),
        beneficiary,
        token,
        amount: BigInt(row.amount),
        nextExecuteAt: BigInt(row.nextExecuteAt),
        interval: BigInt(row.interval),
        active: row.active === 1
    };
}

// Payloads are stored canonicalized, so bigints come back as decimal strings.
function reviveEvent(type: string, raw: Record<string, string | boolean>): AccountEvent {
    const field = (name: string): string => {
        const v = raw[name];
        if (typeof v !== 'string') throw new Error(`SQLiteEventStore: ${type} row missing field ${name}`);
        return v;
    };

    switch (type) {
        case 'SubscriptionCreated': {
            const token = field('token');
            if (!isAddress(token, { strict: false })) throw new Error(`SQLiteEventStore: malformed token ${token}`);
            return {
                type: 'SubscriptionCreated',
                token,
                id: BigInt(field('id')),
                amount: BigInt(field('amount')),
                initialDelay: BigInt(field('initialDelay'))
            };
        }
        case 'SubscriptionCancelled':
            return { type: 'SubscriptionCancelled', cancelled: true, id: BigInt(field('id')) };
        case 'SubscriptionExecuted':
            return { type: 'SubscriptionExecuted', id: BigInt(field('id')), success: true };
        case 'SubscriptionFailed':
            return { type: 'SubscriptionFailed', id: BigInt(field('id')), success: false };
        default:
            throw new Error(`SQLiteEventStore: unknown event type ${type}`);
    }
}
