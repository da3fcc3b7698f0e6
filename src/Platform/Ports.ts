import type { Address, CallResult, Hex, UnixSeconds } from '../kernel-core/L0/Primitives.js';

/**
 * Execution Port: Call Invoker
 * Moves value or calls a target on behalf of the account. Opaque to the core;
 * the callee may call back into the account.
 */
export interface ICallInvoker {
    invoke(target: Address, value: bigint, payload: Hex): Promise<CallResult>;
}

/**
 * Environment Port: System Clock
 * Unix seconds.
 */
export interface ISystemClock {
    now(): UnixSeconds;
}
