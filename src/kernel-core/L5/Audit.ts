// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { Address, SubscriptionID, UnixSeconds } from '../L0/Primitives.js';
import type { Subscription } from '../L2/State.js';

// --- Observable events (payload shape is part of the external contract) ---
export interface SubscriptionCreated {
    type: 'SubscriptionCreated';
    token: Address;
    id: SubscriptionID;
    amount: bigint;
    initialDelay: bigint;
}

export interface SubscriptionCancelled {
    type: 'SubscriptionCancelled';
    cancelled: true;
    id: SubscriptionID;
}

export interface SubscriptionExecuted {
    type: 'SubscriptionExecuted';
    id: SubscriptionID;
    success: true;
}

export interface SubscriptionFailed {
    type: 'SubscriptionFailed';
    id: SubscriptionID;
    success: false;
}

export type AccountEvent = SubscriptionCreated | SubscriptionCancelled | SubscriptionExecuted | SubscriptionFailed;
export type AccountEventType = AccountEvent['type'];

/**
 * Event Store Port. Persistent backends implement this; the log works without one.
 * `append` writes the record together with the subscription it touched, all or nothing,
 * so the registry can be restored from `getSubscriptions` after a restart.
 */
export interface IEventStore {
    append(record: EventRecord, subscription: Subscription): Promise<void>;
    getHistory(): Promise<EventRecord[]>;
    getLatest(): Promise<EventRecord | null>;
    getSubscriptions(): Promise<Subscription[]>;
}

export interface EventRecord {
    eventId: string; // The identifying hash
    previousEventId: string; // Chain linkage
    event: AccountEvent;
    timestamp: UnixSeconds;
}

export type EventListener = (record: EventRecord) => void;

export class EventLog {
    private localChain: EventRecord[] = [];
    private listeners: EventListener[] = [];
    private readonly genesisHash = '0'.repeat(64);

    constructor(private store?: IEventStore) { }

    public subscribe(listener: EventListener): void {
        this.listeners.push(listener);
    }

    /**
     * `subscription` is the record as it stands after `event`. Callers commit it to
     * in-memory state only once this resolves.
     */
    public async append(event: AccountEvent, timestamp: UnixSeconds, subscription: Subscription): Promise<EventRecord> {
        if (subscription.id !== event.id) {
            throw new Error(`Audit Error: event for ${event.id} carries subscription ${subscription.id}`);
        }

        const latest = this.localChain.length > 0
            ? this.localChain[this.localChain.length - 1]
            : await this.store?.getLatest();

        const previousHash = latest ? latest.eventId : this.genesisHash;

        const record: EventRecord = {
            eventId: this.calculateHash(previousHash, event, timestamp),
            previousEventId: previousHash,
            event: Object.freeze({ ...event }),
            timestamp
        };

        Object.freeze(record);

        if (this.store) {
            await this.store.append(record, subscription);
        }

        this.localChain.push(record);
        for (const listener of this.listeners) listener(record);
        return record;
    }

    public async getHistory(): Promise<EventRecord[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    /**
     * Persisted registry, or null when the log has no store.
     */
    public async getSubscriptions(): Promise<Subscription[] | null> {
        return this.store ? await this.store.getSubscriptions() : null;
    }

    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = this.genesisHash;

        for (const entry of history) {
            if (entry.previousEventId !== prev) return false;
            if (this.calculateHash(prev, entry.event, entry.timestamp) !== entry.eventId) return false;
            prev = entry.eventId;
        }
        return true;
    }

    public async getTip(): Promise<EventRecord | null> {
        if (this.localChain.length > 0) return this.localChain[this.localChain.length - 1] ?? null;
        if (this.store) return (await this.store.getLatest()) ?? null;
        return null;
    }

    private calculateHash(prevHash: string, event: AccountEvent, timestamp: UnixSeconds): string {
        // [PreviousHash, EventType, Timestamp, PayloadHash]
        const canonical: [string, string, string, string] = [
            prevHash,
            event.type,
            timestamp.toString(),
            hash(canonicalize(event))
        ];
        return hash(canonicalize(canonical));
    }
}
