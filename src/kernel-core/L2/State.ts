import { produce } from 'immer';
import type { SubscriptionTerms } from '../L0/Guards.js';
import type { Address, SubscriptionID, UnixSeconds } from '../L0/Primitives.js';

// --- Subscription Record ---
export interface Subscription {
    readonly id: SubscriptionID;
    readonly beneficiary: Address;
    readonly token: Address;
    readonly amount: bigint;
    readonly nextExecuteAt: UnixSeconds;
    readonly interval: bigint;
    readonly active: boolean;
}

export interface RegistryState {
    // Keyed by decimal id. Records are never removed.
    subscriptions: Record<string, Subscription>;
    totalSubscriptions: bigint;
}

/**
 * Append-only arena of subscriptions. Cancelled records stay as tombstones
 * (`active = false`) so history remains queryable.
 *
 * Validation happens in the guards before any call lands here; this class
 * only rejects transitions that would corrupt the arena itself.
 */
export class SubscriptionState {
    private current: RegistryState = {
        subscriptions: {},
        totalSubscriptions: 0n
    };

    public get totalSubscriptions(): bigint {
        return this.current.totalSubscriptions;
    }

    public get(id: SubscriptionID): Subscription | undefined {
        return this.current.subscriptions[id.toString()];
    }

    public list(): Subscription[] {
        const out: Subscription[] = [];
        for (let id = 1n; id <= this.current.totalSubscriptions; id++) {
            const sub = this.get(id);
            if (sub) out.push(sub);
        }
        return out;
    }

    /**
     * Builds the next record without storing it. Nothing changes until `commit`.
     */
    public created(terms: SubscriptionTerms, now: UnixSeconds): Subscription {
        return {
            id: this.current.totalSubscriptions + 1n,
            beneficiary: terms.beneficiary,
            token: terms.token,
            amount: terms.amount,
            nextExecuteAt: now + terms.initialDelay,
            interval: terms.interval,
            active: true
        };
    }

    public deactivated(id: SubscriptionID): Subscription {
        return { ...this.require(id), active: false };
    }

    /**
     * The record moved forward by one interval. The record stays active.
     */
    public advanced(id: SubscriptionID): Subscription {
        const existing = this.require(id);
        if (!existing.active) throw new Error(`State Error: cannot advance inactive subscription ${id}`);
        return { ...existing, nextExecuteAt: existing.nextExecuteAt + existing.interval };
    }

    /**
     * Stores `record`. New records must take the next id; existing ones cannot be reactivated.
     */
    public commit(record: Subscription): Subscription {
        const existing = this.get(record.id);
        if (!existing && record.id !== this.current.totalSubscriptions + 1n) {
            throw new Error(`State Error: subscription ${record.id} is not the next id`);
        }
        if (existing && !existing.active && record.active) {
            throw new Error(`State Error: subscription ${record.id} is cancelled`);
        }

        this.current = produce(this.current, draft => {
            draft.subscriptions[record.id.toString()] = record;
            if (record.id > draft.totalSubscriptions) draft.totalSubscriptions = record.id;
        });
        return this.require(record.id);
    }

    public insert(terms: SubscriptionTerms, now: UnixSeconds): Subscription {
        return this.commit(this.created(terms, now));
    }

    public deactivate(id: SubscriptionID): Subscription {
        return this.commit(this.deactivated(id));
    }

    public advance(id: SubscriptionID): Subscription {
        return this.commit(this.advanced(id));
    }

    /**
     * Replaces the arena with persisted records, e.g. after a restart.
     * Ids must be dense from 1.
     */
    public restore(records: readonly Subscription[]): void {
        const sorted = [...records].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
        const subscriptions: Record<string, Subscription> = {};
        let total = 0n;
        for (const record of sorted) {
            if (record.id !== total + 1n) throw new Error(`State Error: persisted ids are not dense at ${record.id}`);
            subscriptions[record.id.toString()] = record;
            total = record.id;
        }
        this.current = produce(this.current, draft => {
            draft.subscriptions = subscriptions;
            draft.totalSubscriptions = total;
        });
    }

    private require(id: SubscriptionID): Subscription {
        const sub = this.get(id);
        if (!sub) throw new Error(`State Error: unknown subscription ${id}`);
        return sub;
    }
}
