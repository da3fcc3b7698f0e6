import { recoverSigner } from './L0/Crypto.js';
import type { SignerRecovery } from './L0/Crypto.js';
import {
    enforce,
    DispatcherGuard,
    DispatcherOrOwnerGuard,
    SignatureGuard,
    NonceGuard,
    SubscriptionTermsGuard,
    ActiveSubscriptionGuard
} from './L0/Guards.js';
import type { SubscriptionTerms } from './L0/Guards.js';
import { VALIDATION_SUCCESS } from './L0/Primitives.js';
import type { Address, Hex, SignedOperation, SubscriptionID } from './L0/Primitives.js';
import { ReentrancyLock } from './L0/ReentrancyLock.js';
import { AccountIdentity } from './L1/Identity.js';
import { SubscriptionState } from './L2/State.js';
import type { Subscription } from './L2/State.js';
import { ProjectionEngine, SubscriptionActivityProjection } from './L3/Projections.js';
import type { SubscriptionActivity } from './L3/Projections.js';
import { UpkeepScheduler } from './L4/Scheduler.js';
import type { UpkeepCheck, UpkeepReport } from './L4/Scheduler.js';
import { EventLog } from './L5/Audit.js';
import type { IEventStore } from './L5/Audit.js';
import { ErrorCode, KernelError } from './Errors.js';
import type { ICallInvoker, ISystemClock } from '../Platform/Ports.js';

export interface AccountDependencies {
    identity: AccountIdentity;
    invoker: ICallInvoker;
    clock: ISystemClock;
    eventStore?: IEventStore;
    recover?: SignerRecovery;
    batchLimit?: number;
}

/**
 * SubscriptionAccount: single account that
 *  - validates owner-signed operations relayed by the dispatcher,
 *  - runs arbitrary calls for the owner or dispatcher,
 *  - keeps a registry of recurring payments settled through upkeep.
 *
 * Every mutating entry point refuses to run while an outbound call is in flight.
 */
export class SubscriptionAccount {
    public readonly identity: AccountIdentity;
    public readonly log: EventLog;
    public readonly projections: ProjectionEngine;

    private readonly state = new SubscriptionState();
    private readonly lock = new ReentrancyLock();
    private readonly activity = new SubscriptionActivityProjection();
    private readonly scheduler: UpkeepScheduler;
    private readonly invoker: ICallInvoker;
    private readonly clock: ISystemClock;
    private readonly recover: SignerRecovery;

    constructor(deps: AccountDependencies) {
        this.identity = deps.identity;
        this.invoker = deps.invoker;
        this.clock = deps.clock;
        this.recover = deps.recover ?? recoverSigner;

        this.log = new EventLog(deps.eventStore);
        this.projections = new ProjectionEngine();
        this.projections.register(this.activity);
        this.log.subscribe(record => this.projections.apply(record));

        this.scheduler = new UpkeepScheduler(
            this.state,
            this.invoker,
            this.clock,
            this.log,
            this.lock,
            deps.batchLimit === undefined ? {} : { batchLimit: deps.batchLimit }
        );
    }

    /**
     * Reloads the registry persisted by the event store and rebuilds projections from
     * the stored history. Call once before serving traffic.
     */
    public async restore(): Promise<void> {
        this.lock.assertUnlocked('restore');
        const subscriptions = await this.log.getSubscriptions();
        if (subscriptions) this.state.restore(subscriptions);

        const history = await this.log.getHistory();
        this.projections.replay(history);
        console.log(`[SubscriptionAccount] Restored ${this.state.totalSubscriptions} subscriptions and ${history.length} events`);
    }

    // --- Views ---
    public get owner(): Address { return this.identity.owner; }
    public get dispatcher(): Address { return this.identity.dispatcher; }
    public get totalSubscriptions(): bigint { return this.state.totalSubscriptions; }
    public get batchLimit(): number { return this.scheduler.batchLimit; }

    public getSubscription(id: SubscriptionID): Subscription | undefined {
        return this.state.get(id);
    }

    public listSubscriptions(): Subscription[] {
        return this.state.list();
    }

    /**
     * Ids whose transfer went through but whose outcome could not be recorded.
     * Upkeep leaves them alone until the process restarts.
     */
    public heldSubscriptions(): SubscriptionID[] {
        return this.scheduler.heldSubscriptions();
    }

    public getActivity(id: SubscriptionID): SubscriptionActivity | undefined {
        return this.activity.get(id);
    }

    // --- Operation Validation ---

    /**
     * Checks that `op` was signed by the owner and carries a 64-bit nonce, then
     * pays the dispatcher `missingFunds`. Returns VALIDATION_SUCCESS or throws.
     * A failed prefund is logged only: covering its own costs is the dispatcher's concern.
     */
    public async validateOperation(caller: Address, op: SignedOperation, opDigest: Hex, missingFunds: bigint): Promise<bigint> {
        this.lock.assertUnlocked('validateOperation');
        enforce(DispatcherGuard({ caller, identity: this.identity }));

        const signer = await this.recover(opDigest, op.signature);
        enforce(SignatureGuard({ signer, identity: this.identity }));
        enforce(NonceGuard({ nonce: op.nonce }));

        if (missingFunds > 0n) {
            await this.lock.run('prefund', async () => {
                try {
                    const result = await this.invoker.invoke(this.identity.dispatcher, missingFunds, '0x');
                    if (!result.success) {
                        console.warn(`[SubscriptionAccount] Prefund of ${missingFunds} to dispatcher did not settle`);
                    }
                } catch (e) {
                    console.warn(`[SubscriptionAccount] Prefund of ${missingFunds} to dispatcher threw:`, e);
                }
            });
        }

        return VALIDATION_SUCCESS;
    }

    // --- Generic Execution ---

    public async execute(caller: Address, target: Address, value: bigint, payload: Hex): Promise<Hex> {
        this.lock.assertUnlocked('execute');
        enforce(DispatcherOrOwnerGuard({ caller, identity: this.identity }));

        return this.lock.run('execute', () => this.call(target, value, payload));
    }

    /**
     * Runs calls in order. `values` may be empty, meaning zero value for every call.
     * The first failing call aborts the rest.
     */
    public async executeBatch(caller: Address, targets: Address[], values: bigint[], payloads: Hex[]): Promise<Hex[]> {
        this.lock.assertUnlocked('executeBatch');
        enforce(DispatcherOrOwnerGuard({ caller, identity: this.identity }));

        if (targets.length !== payloads.length || (values.length !== 0 && values.length !== payloads.length)) {
            throw new KernelError(ErrorCode.BATCH_LENGTH_MISMATCH, 'targets, values and payloads differ in length', {
                targets: targets.length,
                values: values.length,
                payloads: payloads.length
            });
        }

        return this.lock.run('executeBatch', async () => {
            const results: Hex[] = [];
            for (let i = 0; i < targets.length; i++) {
                const target = targets[i];
                const payload = payloads[i];
                if (target === undefined || payload === undefined) break;
                results.push(await this.call(target, values[i] ?? 0n, payload, i));
            }
            return results;
        });
    }

    private async call(target: Address, value: bigint, payload: Hex, index?: number): Promise<Hex> {
        const result = await this.invoker.invoke(target, value, payload);
        if (!result.success) {
            throw new KernelError(ErrorCode.TRANSFER_FAILED, `Call to ${target} failed`, {
                returndata: result.returndata,
                ...(index === undefined ? {} : { index })
            });
        }
        return result.returndata;
    }

    // --- Subscription Registry ---

    public async createSubscription(caller: Address, terms: SubscriptionTerms): Promise<SubscriptionID> {
        this.lock.assertUnlocked('createSubscription');
        enforce(DispatcherOrOwnerGuard({ caller, identity: this.identity }));
        enforce(SubscriptionTermsGuard(terms));

        const now = this.clock.now();
        const sub = this.state.created(terms, now);
        await this.log.append({
            type: 'SubscriptionCreated',
            token: sub.token,
            id: sub.id,
            amount: sub.amount,
            initialDelay: terms.initialDelay
        }, now, sub);
        this.state.commit(sub);

        console.log(`[SubscriptionAccount] Subscription ${sub.id} created, first due at ${sub.nextExecuteAt}`);
        return sub.id;
    }

    public async cancelSubscription(caller: Address, id: SubscriptionID): Promise<void> {
        this.lock.assertUnlocked('cancelSubscription');
        enforce(DispatcherOrOwnerGuard({ caller, identity: this.identity }));

        const existing = this.state.get(id);
        enforce(ActiveSubscriptionGuard({ id, total: this.state.totalSubscriptions, active: existing?.active ?? false }));

        const cancelled = this.state.deactivated(id);
        await this.log.append({ type: 'SubscriptionCancelled', cancelled: true, id }, this.clock.now(), cancelled);
        this.state.commit(cancelled);

        console.log(`[SubscriptionAccount] Subscription ${id} cancelled`);
    }

    // --- Upkeep ---

    public checkUpkeep(): UpkeepCheck {
        return this.scheduler.checkUpkeep();
    }

    /**
     * Open to any caller. Ids that are unknown, cancelled or not yet due are skipped.
     */
    public async performUpkeep(batch: readonly SubscriptionID[]): Promise<UpkeepReport> {
        return this.scheduler.performUpkeep(batch);
    }
}
