// src/kernel-core/L0/Guards.ts
import type { AccountIdentity } from '../L1/Identity.js';
import { ErrorCode, KernelError } from '../Errors.js';
import { isZeroIdentity } from './Crypto.js';
import { MAX_UINT64 } from './Primitives.js';
import type { Address, SubscriptionID } from './Primitives.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
    details?: Record<string, unknown>;
}

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult => ({ ok: false, code, violation: msg, details });

/**
 * Converts a failed GuardResult into a KernelError. Guards stay pure; entry points enforce.
 */
export function enforce(result: GuardResult): void {
    if (result.ok) return;
    throw new KernelError(result.code ?? ErrorCode.VALIDATION_FAILED, result.violation ?? 'Guard rejected call', result.details);
}

// --- Caller Predicates ---
export interface CallerContext {
    caller: Address;
    identity: AccountIdentity;
}

export type CallerPredicate = (ctx: CallerContext) => boolean;

export const isDispatcher: CallerPredicate = ({ caller, identity }) => identity.isDispatcher(caller);
export const isOwner: CallerPredicate = ({ caller, identity }) => identity.isOwner(caller);

// --- Access Gate ---

// 1. Dispatcher only
export const DispatcherGuard: Guard<CallerContext> = (ctx) => {
    if (!isDispatcher(ctx)) {
        return FAIL(ErrorCode.NOT_AUTHORIZED_DISPATCHER, `Caller ${ctx.caller} is not the dispatcher`, { caller: ctx.caller });
    }
    return OK;
};

// 2. Dispatcher or owner. Either principal suffices on its own.
export const DispatcherOrOwnerGuard: Guard<CallerContext> = (ctx) => {
    if (!(isDispatcher(ctx) || isOwner(ctx))) {
        return FAIL(ErrorCode.NOT_AUTHORIZED_DISPATCHER_OR_OWNER, `Caller ${ctx.caller} is neither dispatcher nor owner`, { caller: ctx.caller });
    }
    return OK;
};

// --- Operation Guards ---

// 3. Signature: the recovered signer must be the owner, exactly
export const SignatureGuard: Guard<{ signer: Address, identity: AccountIdentity }> = ({ signer, identity }) => {
    if (isZeroIdentity(signer) || !identity.isOwner(signer)) {
        return FAIL(ErrorCode.VALIDATION_FAILED, "Operation was not signed by the owner", { signer });
    }
    return OK;
};

// 4. Nonce format bound (replay ledger itself lives with the dispatcher)
export const NonceGuard: Guard<{ nonce: bigint }> = ({ nonce }) => {
    if (nonce < 0n || nonce > MAX_UINT64) {
        return FAIL(ErrorCode.NONCE_OUT_OF_RANGE, `Nonce ${nonce} outside 64-bit range`, { nonce: nonce.toString() });
    }
    return OK;
};

// --- Registry Guards ---
export interface SubscriptionTerms {
    beneficiary: Address;
    token: Address;
    amount: bigint;
    initialDelay: bigint;
    interval: bigint;
}

// 5. Creation terms, checked in order, first violation wins
export const SubscriptionTermsGuard: Guard<SubscriptionTerms> = (terms) => {
    if (isZeroIdentity(terms.beneficiary)) return FAIL(ErrorCode.BENEFICIARY_IS_ZERO, "Beneficiary is the zero identity");
    if (isZeroIdentity(terms.token)) return FAIL(ErrorCode.TOKEN_ADDR_IS_ZERO, "Token is the zero identity");
    if (terms.amount <= 0n) return FAIL(ErrorCode.AMOUNT_IS_ZERO, "Amount must be positive");
    if (terms.initialDelay <= 0n) return FAIL(ErrorCode.EXECUTE_TIME_IS_ZERO, "Initial delay must be positive");
    if (terms.interval < terms.initialDelay) {
        return FAIL(ErrorCode.INTERVAL_TOO_SHORT, `Interval ${terms.interval} shorter than initial delay ${terms.initialDelay}`);
    }
    return OK;
};

// 6. Cancellation target must exist and still be active
export const ActiveSubscriptionGuard: Guard<{ id: SubscriptionID, total: bigint, active: boolean }> = ({ id, total, active }) => {
    if (id < 1n || id > total || !active) {
        return FAIL(ErrorCode.SUBSCRIPTION_INVALID, `Subscription ${id} is invalid`, { id: id.toString() });
    }
    return OK;
};
