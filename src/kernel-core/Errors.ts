/**
 * Account Error Taxonomy
 * Centralized error codes for rejections of the current call.
 * None of these are process-fatal.
 */

export enum ErrorCode {
    // I. Authorization
    NOT_AUTHORIZED_DISPATCHER = 'NOT_AUTHORIZED_DISPATCHER',
    NOT_AUTHORIZED_DISPATCHER_OR_OWNER = 'NOT_AUTHORIZED_DISPATCHER_OR_OWNER',
    VALIDATION_FAILED = 'VALIDATION_FAILED',

    // II. Input Validation
    BENEFICIARY_IS_ZERO = 'BENEFICIARY_IS_ZERO',
    TOKEN_ADDR_IS_ZERO = 'TOKEN_ADDR_IS_ZERO',
    AMOUNT_IS_ZERO = 'AMOUNT_IS_ZERO',
    EXECUTE_TIME_IS_ZERO = 'EXECUTE_TIME_IS_ZERO',
    INTERVAL_TOO_SHORT = 'INTERVAL_TOO_SHORT',
    SUBSCRIPTION_INVALID = 'SUBSCRIPTION_INVALID',
    NONCE_OUT_OF_RANGE = 'NONCE_OUT_OF_RANGE',
    BATCH_LENGTH_MISMATCH = 'BATCH_LENGTH_MISMATCH',

    // III. Execution
    TRANSFER_FAILED = 'TRANSFER_FAILED',
    REENTRANT_CALL = 'REENTRANT_CALL',

    // IV. Environment
    CONFIG_INVALID = 'CONFIG_INVALID',
}

export type ErrorCategory = 'AUTHORIZATION' | 'INPUT' | 'EXECUTION' | 'CONCURRENCY' | 'ENVIRONMENT';

const CATEGORIES: Record<ErrorCode, ErrorCategory> = {
    [ErrorCode.NOT_AUTHORIZED_DISPATCHER]: 'AUTHORIZATION',
    [ErrorCode.NOT_AUTHORIZED_DISPATCHER_OR_OWNER]: 'AUTHORIZATION',
    [ErrorCode.VALIDATION_FAILED]: 'AUTHORIZATION',
    [ErrorCode.BENEFICIARY_IS_ZERO]: 'INPUT',
    [ErrorCode.TOKEN_ADDR_IS_ZERO]: 'INPUT',
    [ErrorCode.AMOUNT_IS_ZERO]: 'INPUT',
    [ErrorCode.EXECUTE_TIME_IS_ZERO]: 'INPUT',
    [ErrorCode.INTERVAL_TOO_SHORT]: 'INPUT',
    [ErrorCode.SUBSCRIPTION_INVALID]: 'INPUT',
    [ErrorCode.NONCE_OUT_OF_RANGE]: 'INPUT',
    [ErrorCode.BATCH_LENGTH_MISMATCH]: 'INPUT',
    [ErrorCode.TRANSFER_FAILED]: 'EXECUTION',
    [ErrorCode.REENTRANT_CALL]: 'CONCURRENCY',
    [ErrorCode.CONFIG_INVALID]: 'ENVIRONMENT',
};

export function categoryOf(code: ErrorCode): ErrorCategory {
    return CATEGORIES[code];
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Account:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

export function isKernelError(e: unknown): e is KernelError {
    return e instanceof KernelError;
}
