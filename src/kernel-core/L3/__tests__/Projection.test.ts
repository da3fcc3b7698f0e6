import { jest, describe, test, expect } from '@jest/globals';
import { ProjectionEngine, SubscriptionActivityProjection } from '../Projections.js';
import type { Projection } from '../Projections.js';
import type { AccountEvent, EventRecord } from '../../L5/Audit.js';

const record = (n: number, event: AccountEvent): EventRecord => ({
    eventId: `e${n}`,
    previousEventId: `e${n - 1}`,
    event,
    timestamp: BigInt(n * 100)
});

const created = record(1, { type: 'SubscriptionCreated', token: '0x0000000000000000000000000000000000000002', id: 1n, amount: 5n, initialDelay: 60n });
const failed = record(2, { type: 'SubscriptionFailed', id: 1n, success: false });

const history: EventRecord[] = [
    created,
    failed,
    record(3, { type: 'SubscriptionExecuted', id: 1n, success: true }),
    record(4, { type: 'SubscriptionExecuted', id: 1n, success: true }),
    record(5, { type: 'SubscriptionCancelled', cancelled: true, id: 1n })
];

describe('Projection Framework', () => {
    test('should replay the event log into the activity projection', () => {
        const engine = new ProjectionEngine();
        const activity = new SubscriptionActivityProjection();
        engine.register(activity);

        engine.replay(history);

        expect(activity.get(1n)).toEqual({
            executions: 2,
            failures: 1,
            cancelled: true,
            lastOutcome: 'EXECUTED',
            lastEventAt: 500n
        });
        expect(activity.get(2n)).toBeUndefined();
    });

    test('replay is idempotent', () => {
        const engine = new ProjectionEngine();
        const activity = new SubscriptionActivityProjection();
        engine.register(activity);

        engine.replay(history);
        engine.replay(history);

        expect(activity.get(1n)?.executions).toBe(2);
    });

    test('get returns a copy', () => {
        const activity = new SubscriptionActivityProjection();
        activity.apply(created);

        const view = activity.get(1n);
        if (view) view.executions = 99;

        expect(activity.get(1n)?.executions).toBe(0);
    });

    test('a failing projection does not block the others', () => {
        const engine = new ProjectionEngine();
        const broken: Projection<null> = {
            name: 'broken',
            reset: () => undefined,
            apply: () => { throw new Error('projection bug'); },
            getState: () => null
        };
        const activity = new SubscriptionActivityProjection();
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        engine.register(broken);
        engine.register(activity);
        engine.apply(failed);

        expect(activity.get(1n)?.failures).toBe(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        errorSpy.mockRestore();
    });
});
