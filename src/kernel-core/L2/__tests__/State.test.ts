import { describe, test, expect, beforeEach } from '@jest/globals';
import { SubscriptionState } from '../State.js';
import type { SubscriptionTerms } from '../../L0/Guards.js';

const terms: SubscriptionTerms = {
    beneficiary: '0x0000000000000000000000000000000000000001',
    token: '0x0000000000000000000000000000000000000002',
    amount: 5n,
    initialDelay: 60n,
    interval: 3_600n
};

describe('SubscriptionState', () => {
    let state: SubscriptionState;

    beforeEach(() => {
        state = new SubscriptionState();
    });

    test('insert assigns dense ids and schedules the first run', () => {
        const first = state.insert(terms, 1_000n);
        const second = state.insert(terms, 2_000n);

        expect(first.id).toBe(1n);
        expect(second.id).toBe(2n);
        expect(second.nextExecuteAt).toBe(2_060n);
        expect(state.totalSubscriptions).toBe(2n);
    });

    test('records are immutable snapshots', () => {
        const before = state.insert(terms, 0n);
        state.advance(1n);

        expect(before.nextExecuteAt).toBe(60n);
        expect(state.get(1n)?.nextExecuteAt).toBe(3_660n);
        expect(Object.isFrozen(state.get(1n))).toBe(true);
    });

    test('deactivate keeps the record as a tombstone', () => {
        state.insert(terms, 0n);
        const cancelled = state.deactivate(1n);

        expect(cancelled.active).toBe(false);
        expect(state.totalSubscriptions).toBe(1n);
        expect(state.list()).toHaveLength(1);
    });

    test('advance refuses inactive and unknown ids', () => {
        state.insert(terms, 0n);
        state.deactivate(1n);

        expect(() => state.advance(1n)).toThrow('cannot advance inactive subscription 1');
        expect(() => state.advance(7n)).toThrow('unknown subscription 7');
    });

    test('prepared records change nothing until committed', () => {
        const draft = state.created(terms, 0n);

        expect(draft.id).toBe(1n);
        expect(state.totalSubscriptions).toBe(0n);
        expect(state.get(1n)).toBeUndefined();

        state.commit(draft);
        expect(state.totalSubscriptions).toBe(1n);
    });

    test('commit refuses to skip ids or revive a cancelled record', () => {
        const first = state.insert(terms, 0n);
        expect(() => state.commit({ ...first, id: 3n })).toThrow('subscription 3 is not the next id');

        state.deactivate(1n);
        expect(() => state.commit(first)).toThrow('subscription 1 is cancelled');
    });

    test('restore rebuilds the arena and counter', () => {
        const other = new SubscriptionState();
        const one = other.insert(terms, 0n);
        const two = other.deactivate(other.insert(terms, 5n).id);

        state.restore([two, one]);

        expect(state.totalSubscriptions).toBe(2n);
        expect(state.list()).toEqual([one, two]);
        expect(state.created(terms, 0n).id).toBe(3n);
    });

    test('restore rejects gaps in the persisted ids', () => {
        const one = state.insert(terms, 0n);
        expect(() => new SubscriptionState().restore([{ ...one, id: 2n }])).toThrow('persisted ids are not dense at 2');
    });
});
