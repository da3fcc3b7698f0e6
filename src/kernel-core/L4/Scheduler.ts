import { decodeFunctionResult, encodeFunctionData, erc20Abi } from 'viem';
import type { CallResult, SubscriptionID, UnixSeconds } from '../L0/Primitives.js';
import { UPKEEP_BATCH_LIMIT } from '../L0/Primitives.js';
import type { ReentrancyLock } from '../L0/ReentrancyLock.js';
import type { Subscription, SubscriptionState } from '../L2/State.js';
import type { EventLog } from '../L5/Audit.js';
import type { ICallInvoker, ISystemClock } from '../../Platform/Ports.js';

export interface UpkeepCheck {
    upkeepNeeded: boolean;
    batch: SubscriptionID[];
}

export type SkipReason = 'UNKNOWN' | 'INACTIVE' | 'NOT_DUE' | 'DUPLICATE' | 'HELD';

export interface UpkeepReport {
    executed: SubscriptionID[];
    failed: SubscriptionID[];
    skipped: { id: SubscriptionID, reason: SkipReason }[];
    // Settled (or failed) but the event could not be written; registry left untouched
    unrecorded: { id: SubscriptionID, outcome: 'EXECUTED' | 'FAILED' }[];
}

export interface SchedulerOptions {
    batchLimit?: number;
}

/**
 * A transfer counts when the call succeeded and returned either nothing or `true`.
 */
export function transferSucceeded(result: CallResult): boolean {
    if (!result.success) return false;
    if (result.returndata === '0x') return true;
    try {
        return decodeFunctionResult({ abi: erc20Abi, functionName: 'transfer', data: result.returndata }) === true;
    } catch (e) {
        return false;
    }
}

/**
 * Upkeep Scheduler: poll for due subscriptions, then settle a batch of them.
 * Each item in a batch stands alone; a failed transfer holds that item's due
 * time so it reappears on the next poll.
 */
export class UpkeepScheduler {
    public readonly batchLimit: number;
    // Paid but not recorded: kept out of upkeep so the transfer is not repeated
    private readonly held = new Set<SubscriptionID>();

    constructor(
        private state: SubscriptionState,
        private invoker: ICallInvoker,
        private clock: ISystemClock,
        private log: EventLog,
        private lock: ReentrancyLock,
        options: SchedulerOptions = {}
    ) {
        this.batchLimit = options.batchLimit ?? UPKEEP_BATCH_LIMIT;
        if (!Number.isInteger(this.batchLimit) || this.batchLimit < 1) {
            throw new Error(`Scheduler Error: batch limit must be a positive integer, got ${this.batchLimit}`);
        }
    }

    public isDue(sub: Subscription, now: UnixSeconds): boolean {
        return sub.active && now >= sub.nextExecuteAt && !this.held.has(sub.id);
    }

    public heldSubscriptions(): SubscriptionID[] {
        return [...this.held];
    }

    /**
     * Ascending scan over 1..totalSubscriptions. Stops collecting at the batch limit,
     * so lower ids always take precedence.
     */
    public checkUpkeep(): UpkeepCheck {
        const now = this.clock.now();
        const batch: SubscriptionID[] = [];
        const total = this.state.totalSubscriptions;

        for (let id = 1n; id <= total && batch.length < this.batchLimit; id++) {
            const sub = this.state.get(id);
            if (sub && this.isDue(sub, now)) batch.push(id);
        }

        return { upkeepNeeded: batch.length > 0, batch };
    }

    public async performUpkeep(batch: readonly SubscriptionID[]): Promise<UpkeepReport> {
        return this.lock.run('performUpkeep', async () => {
            const now = this.clock.now();
            const report: UpkeepReport = { executed: [], failed: [], skipped: [], unrecorded: [] };
            const seen = new Set<SubscriptionID>();

            for (const id of batch) {
                if (seen.has(id)) {
                    report.skipped.push({ id, reason: 'DUPLICATE' });
                    continue;
                }
                seen.add(id);

                const sub = this.state.get(id);
                const reason = this.rejectReason(sub, now);
                if (!sub || reason) {
                    console.warn(`[UpkeepScheduler] Skipping subscription ${id}: ${reason ?? 'UNKNOWN'}`);
                    report.skipped.push({ id, reason: reason ?? 'UNKNOWN' });
                    continue;
                }

                const settled = await this.settle(sub);
                try {
                    if (settled) {
                        const next = this.state.advanced(id);
                        await this.log.append({ type: 'SubscriptionExecuted', id, success: true }, now, next);
                        this.state.commit(next);
                        report.executed.push(id);
                    } else {
                        await this.log.append({ type: 'SubscriptionFailed', id, success: false }, now, sub);
                        report.failed.push(id);
                    }
                } catch (e) {
                    console.error(`[UpkeepScheduler] Could not record outcome of subscription ${id}:`, e);
                    report.unrecorded.push({ id, outcome: settled ? 'EXECUTED' : 'FAILED' });
                    if (settled) this.held.add(id);
                }
            }

            console.log(`[UpkeepScheduler] Upkeep at ${now}: ${report.executed.length} executed, ${report.failed.length} failed, ${report.skipped.length} skipped, ${report.unrecorded.length} unrecorded`);
            return report;
        });
    }

    private rejectReason(sub: Subscription | undefined, now: UnixSeconds): SkipReason | null {
        if (!sub) return 'UNKNOWN';
        if (!sub.active) return 'INACTIVE';
        if (now < sub.nextExecuteAt) return 'NOT_DUE';
        if (this.held.has(sub.id)) return 'HELD';
        return null;
    }

    private async settle(sub: Subscription): Promise<boolean> {
        const payload = encodeFunctionData({
            abi: erc20Abi,
            functionName: 'transfer',
            args: [sub.beneficiary, sub.amount]
        });

        try {
            const result = await this.invoker.invoke(sub.token, 0n, payload);
            return transferSucceeded(result);
        } catch (e) {
            console.warn(`[UpkeepScheduler] Transfer for subscription ${sub.id} threw:`, e);
            return false;
        }
    }
}
