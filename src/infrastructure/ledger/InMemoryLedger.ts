import { decodeFunctionData, encodeErrorResult, encodeFunctionResult, erc20Abi, parseAbi } from 'viem';
import type { Address, CallResult, Hex } from '../../kernel-core/L0/Primitives.js';
import type { ICallInvoker } from '../../Platform/Ports.js';

export const LEDGER_ERRORS = parseAbi([
    'error InsufficientBalance(address account, uint256 balance, uint256 needed)',
    'error UnsupportedCall(address target)'
]);

const key = (a: Address) => a.toLowerCase();

/**
 * In-process balance book for native value and ERC-20 style tokens.
 * Stands in for the chain when running the account locally and in tests.
 */
export class InMemoryLedger {
    private native: Map<string, bigint> = new Map();
    private tokens: Map<string, Map<string, bigint>> = new Map();

    public mint(holder: Address, amount: bigint): void {
        this.native.set(key(holder), this.balanceOf(holder) + amount);
    }

    public registerToken(token: Address): void {
        if (!this.tokens.has(key(token))) this.tokens.set(key(token), new Map());
    }

    public mintToken(token: Address, holder: Address, amount: bigint): void {
        this.registerToken(token);
        const book = this.book(token);
        book.set(key(holder), (book.get(key(holder)) ?? 0n) + amount);
    }

    public balanceOf(holder: Address): bigint {
        return this.native.get(key(holder)) ?? 0n;
    }

    public tokenBalanceOf(token: Address, holder: Address): bigint {
        return this.tokens.get(key(token))?.get(key(holder)) ?? 0n;
    }

    /**
     * Call invoker that executes calls with `account` as the sender.
     */
    public invokerFor(account: Address): ICallInvoker {
        return {
            invoke: async (target, value, payload) => this.apply(account, target, value, payload)
        };
    }

    private apply(from: Address, target: Address, value: bigint, payload: Hex): CallResult {
        const available = this.balanceOf(from);
        if (value > available) return this.insufficient(from, available, value);

        if (payload === '0x') {
            this.moveNative(from, target, value);
            return { success: true, returndata: '0x' };
        }
        // Calldata only means something to a registered token
        if (!this.tokens.has(key(target))) return this.unsupported(target);

        const call = this.decode(payload);
        if (!call) return this.unsupported(target);

        const book = this.book(target);
        if (call.functionName === 'transfer') {
            const [to, amount] = call.args;
            const held = book.get(key(from)) ?? 0n;
            if (amount > held) return this.insufficient(from, held, amount);

            this.moveNative(from, target, value);
            book.set(key(from), held - amount);
            book.set(key(to), (book.get(key(to)) ?? 0n) + amount);
            return {
                success: true,
                returndata: encodeFunctionResult({ abi: erc20Abi, functionName: 'transfer', result: true })
            };
        }
        if (call.functionName === 'balanceOf') {
            const [holder] = call.args;
            return {
                success: true,
                returndata: encodeFunctionResult({ abi: erc20Abi, functionName: 'balanceOf', result: book.get(key(holder)) ?? 0n })
            };
        }
        return this.unsupported(target);
    }

    private decode(payload: Hex) {
        try {
            return decodeFunctionData({ abi: erc20Abi, data: payload });
        } catch (e) {
            return null;
        }
    }

    private moveNative(from: Address, to: Address, value: bigint): void {
        if (value === 0n) return;
        this.native.set(key(from), this.balanceOf(from) - value);
        this.native.set(key(to), this.balanceOf(to) + value);
    }

    private book(token: Address): Map<string, bigint> {
        const book = this.tokens.get(key(token));
        if (!book) throw new Error(`Ledger Error: unknown token ${token}`);
        return book;
    }

    private insufficient(account: Address, balance: bigint, needed: bigint): CallResult {
        return {
            success: false,
            returndata: encodeErrorResult({ abi: LEDGER_ERRORS, errorName: 'InsufficientBalance', args: [account, balance, needed] })
        };
    }

    private unsupported(target: Address): CallResult {
        return {
            success: false,
            returndata: encodeErrorResult({ abi: LEDGER_ERRORS, errorName: 'UnsupportedCall', args: [target] })
        };
    }
}
