import { maxUint64, zeroAddress } from 'viem';
import type { Address, Hex } from 'viem';

export type { Address, Hex };

export type SubscriptionID = bigint;
export type UnixSeconds = bigint;

export const ZERO_ADDRESS: Address = zeroAddress;
export const MAX_UINT64: bigint = maxUint64;

// Returned by validateOperation when the signer and nonce check out.
export const VALIDATION_SUCCESS = 0n;

export const UPKEEP_BATCH_LIMIT = 10;

/**
 * Inbound signed operation. The account only reads `nonce` and `signature`;
 * the remaining fields belong to the dispatcher.
 */
export interface SignedOperation {
    sender: Address;
    nonce: bigint;
    callData: Hex;
    callGasLimit: bigint;
    verificationGasLimit: bigint;
    preVerificationGas: bigint;
    maxFeePerGas: bigint;
    maxPriorityFeePerGas: bigint;
    paymasterAndData: Hex;
    signature: Hex;
}

export interface CallResult {
    success: boolean;
    returndata: Hex;
}
