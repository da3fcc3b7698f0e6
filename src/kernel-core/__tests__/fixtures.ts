import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import { SubscriptionAccount } from '../Account.js';
import { AccountIdentity } from '../L1/Identity.js';
import type { Address, Hex, SignedOperation } from '../L0/Primitives.js';
import type { SubscriptionTerms } from '../L0/Guards.js';
import type { EventRecord, IEventStore } from '../L5/Audit.js';
import type { Subscription } from '../L2/State.js';
import { InMemoryLedger } from '../../infrastructure/ledger/InMemoryLedger.js';
import { ManualClock } from '../../infrastructure/clock/SystemClock.js';
import type { ICallInvoker } from '../../Platform/Ports.js';

export const ownerSigner = privateKeyToAccount(generatePrivateKey());
export const strangerSigner = privateKeyToAccount(generatePrivateKey());

export const OWNER: Address = ownerSigner.address;
export const DISPATCHER: Address = '0xd15ba7c4e4000000000000000000000000000001';
export const STRANGER: Address = '0x5742a45e00000000000000000000000000000002';
export const ACCOUNT: Address = '0xacc0000000000000000000000000000000000003';
export const BENEFICIARY: Address = '0xbe4ef1c1a4000000000000000000000000000004';
export const TOKEN: Address = '0x70ce400000000000000000000000000000000005';
export const OTHER_TOKEN: Address = '0x70ce400000000000000000000000000000000006';

export const GENESIS_TIME = 1_700_000_000n;
export const DAY = 86_400n;

export const terms = (overrides: Partial<SubscriptionTerms> = {}): SubscriptionTerms => ({
    beneficiary: BENEFICIARY,
    token: TOKEN,
    amount: 100n,
    initialDelay: DAY,
    interval: 30n * DAY,
    ...overrides
});

export const operation = (signature: Hex, nonce: bigint = 0n): SignedOperation => ({
    sender: ACCOUNT,
    nonce,
    callData: '0x',
    callGasLimit: 100_000n,
    verificationGasLimit: 100_000n,
    preVerificationGas: 21_000n,
    maxFeePerGas: 1n,
    maxPriorityFeePerGas: 1n,
    paymasterAndData: '0x',
    signature
});

/**
 * Event store kept in arrays. `failAt` makes the n-th append (1-based) throw before
 * anything is written.
 */
export class MemoryEventStore implements IEventStore {
    public records: EventRecord[] = [];
    public subscriptions: Map<bigint, Subscription> = new Map();
    private appends = 0;

    constructor(private failAt: number[] = []) { }

    async append(record: EventRecord, subscription: Subscription): Promise<void> {
        this.appends++;
        if (this.failAt.includes(this.appends)) throw new Error('disk full');
        this.records.push(record);
        this.subscriptions.set(subscription.id, subscription);
    }

    async getHistory(): Promise<EventRecord[]> {
        return [...this.records];
    }

    async getLatest(): Promise<EventRecord | null> {
        return this.records[this.records.length - 1] ?? null;
    }

    async getSubscriptions(): Promise<Subscription[]> {
        return [...this.subscriptions.values()];
    }
}

export interface Harness {
    account: SubscriptionAccount;
    clock: ManualClock;
    ledger: InMemoryLedger;
}

export function setupAccount(options: { invoker?: (ledger: InMemoryLedger) => ICallInvoker, eventStore?: IEventStore, batchLimit?: number } = {}): Harness {
    const clock = new ManualClock(GENESIS_TIME);
    const ledger = new InMemoryLedger();
    ledger.registerToken(TOKEN);
    ledger.registerToken(OTHER_TOKEN);

    const account = new SubscriptionAccount({
        identity: new AccountIdentity(OWNER, DISPATCHER),
        invoker: options.invoker ? options.invoker(ledger) : ledger.invokerFor(ACCOUNT),
        clock,
        ...(options.eventStore ? { eventStore: options.eventStore } : {}),
        ...(options.batchLimit === undefined ? {} : { batchLimit: options.batchLimit })
    });

    return { account, clock, ledger };
}
