import type { EventRecord } from '../L5/Audit.js';
import type { UnixSeconds } from '../L0/Primitives.js';

/**
 * Projections are read models derived purely from the event log.
 * They must be deterministic and idempotent over a replayed history.
 */
export interface Projection<T> {
    name: string;

    /**
     * Resets the internal state of the projection to its zero value.
     */
    reset(): void;

    apply(record: EventRecord): void;

    getState(): T;
}

export class ProjectionEngine {
    private projections: Map<string, Projection<unknown>> = new Map();

    public register(projection: Projection<unknown>) {
        if (this.projections.has(projection.name)) {
            console.warn(`[ProjectionEngine] Overwriting projection: ${projection.name}`);
        }
        this.projections.set(projection.name, projection);
    }

    /**
     * Feeds a single record to all registered projections. A failing projection
     * is reported and skipped; the others still see the record.
     */
    public apply(record: EventRecord) {
        for (const projection of this.projections.values()) {
            try {
                projection.apply(record);
            } catch (e) {
                console.error(`[ProjectionEngine] Projection '${projection.name}' failed on event ${record.eventId}:`, e);
            }
        }
    }

    public replay(history: EventRecord[]) {
        this.reset();
        for (const record of history) this.apply(record);
    }

    public reset() {
        for (const projection of this.projections.values()) {
            projection.reset();
        }
    }
}

// --- Subscription Activity ---
export interface SubscriptionActivity {
    executions: number;
    failures: number;
    cancelled: boolean;
    lastOutcome: 'EXECUTED' | 'FAILED' | null;
    lastEventAt: UnixSeconds | null;
}

export type ActivityIndex = ReadonlyMap<string, SubscriptionActivity>;

export class SubscriptionActivityProjection implements Projection<ActivityIndex> {
    public readonly name = 'subscription-activity';
    private index: Map<string, SubscriptionActivity> = new Map();

    public reset(): void {
        this.index = new Map();
    }

    public apply(record: EventRecord): void {
        const { event } = record;
        const key = event.id.toString();
        const entry = this.index.get(key) ?? { executions: 0, failures: 0, cancelled: false, lastOutcome: null, lastEventAt: null };

        switch (event.type) {
            case 'SubscriptionCreated':
                break;
            case 'SubscriptionCancelled':
                entry.cancelled = true;
                break;
            case 'SubscriptionExecuted':
                entry.executions++;
                entry.lastOutcome = 'EXECUTED';
                break;
            case 'SubscriptionFailed':
                entry.failures++;
                entry.lastOutcome = 'FAILED';
                break;
        }
        entry.lastEventAt = record.timestamp;
        this.index.set(key, entry);
    }

    public getState(): ActivityIndex {
        return this.index;
    }

    public get(id: bigint): SubscriptionActivity | undefined {
        const entry = this.index.get(id.toString());
        return entry ? { ...entry } : undefined;
    }
}
