import { z } from 'zod';
import { isAddress } from 'viem';
import type { Address } from 'viem';
import { UPKEEP_BATCH_LIMIT } from '../kernel-core/L0/Primitives.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';

const addressSchema = z.string().trim().refine(
    (value): value is Address => isAddress(value, { strict: false }),
    { message: 'must be a 20-byte hex address' }
);

export interface TokenFunding {
    token: Address;
    balance: bigint;
}

const FUNDING_ENTRY = /^(0x[0-9a-fA-F]{40}):(\d+)$/;

// "0xToken:amount,0xToken:amount" -> opening balances of the in-process ledger
const tokenFundingSchema = z.string().trim().default('').transform((value, ctx) => {
    const funding: TokenFunding[] = [];
    for (const entry of value.split(',').map(e => e.trim()).filter(e => e.length > 0)) {
        const match = FUNDING_ENTRY.exec(entry);
        const token = match?.[1];
        const balance = match?.[2];
        if (token === undefined || balance === undefined || !isAddress(token, { strict: false })) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected <address>:<amount>, got ${entry}` });
            return z.NEVER;
        }
        funding.push({ token, balance: BigInt(balance) });
    }
    return funding;
});

/**
 * Account environment schema
 */
export const AccountEnvSchema = z.object({
    OWNER_ADDRESS: addressSchema,
    DISPATCHER_ADDRESS: addressSchema,
    ACCOUNT_ADDRESS: addressSchema,

    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    EVENT_DB_PATH: z.string().min(1).default('account-events.db'),
    UPKEEP_BATCH_LIMIT: z.coerce.number().int().min(1).max(1000).default(UPKEEP_BATCH_LIMIT),

    LEDGER_NATIVE_BALANCE: z.string().trim().regex(/^\d+$/, 'must be a non-negative integer').default('0').transform(v => BigInt(v)),
    LEDGER_TOKENS: tokenFundingSchema,
});

export type AccountEnv = z.infer<typeof AccountEnvSchema>;

export interface AccountConfig {
    owner: Address;
    dispatcher: Address;
    account: Address;
    port: number;
    eventDbPath: string;
    batchLimit: number;
    nativeBalance: bigint;
    tokens: TokenFunding[];
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AccountConfig {
    const parsed = AccountEnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new KernelError(ErrorCode.CONFIG_INVALID, `Invalid environment: ${issues.join('; ')}`, { issues });
    }

    const e = parsed.data;
    return {
        owner: e.OWNER_ADDRESS,
        dispatcher: e.DISPATCHER_ADDRESS,
        account: e.ACCOUNT_ADDRESS,
        port: e.PORT,
        eventDbPath: e.EVENT_DB_PATH,
        batchLimit: e.UPKEEP_BATCH_LIMIT,
        nativeBalance: e.LEDGER_NATIVE_BALANCE,
        tokens: e.LEDGER_TOKENS
    };
}
