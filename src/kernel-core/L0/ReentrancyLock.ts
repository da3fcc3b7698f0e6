/**
 * Reentrancy Lock
 *
 * Held for the duration of every outbound invocation. A callee that calls back
 * into a mutating entry point of the same account is rejected while it is held.
 */

import { ErrorCode, KernelError } from '../Errors.js';

export interface LockStatus {
    locked: boolean;
    operation?: string;
}

export class ReentrancyLock {
    private operation: string | null = null;

    public getStatus(): LockStatus {
        return this.operation === null ? { locked: false } : { locked: true, operation: this.operation };
    }

    /**
     * Rejects `operation` if an external call is in flight.
     */
    public assertUnlocked(operation: string): void {
        if (this.operation !== null) {
            throw new KernelError(
                ErrorCode.REENTRANT_CALL,
                `${operation} rejected: ${this.operation} is in progress`,
                { operation, holder: this.operation }
            );
        }
    }

    /**
     * Runs `fn` with the lock held. Released on both success and failure.
     */
    public async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        this.assertUnlocked(operation);
        this.operation = operation;
        try {
            return await fn();
        } finally {
            this.operation = null;
        }
    }
}
