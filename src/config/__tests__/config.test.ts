import { describe, test, expect } from '@jest/globals';
import { loadConfig } from '../config.js';
import { ErrorCode } from '../../kernel-core/Errors.js';

const base = {
    OWNER_ADDRESS: '0x1111111111111111111111111111111111111111',
    DISPATCHER_ADDRESS: '0x2222222222222222222222222222222222222222',
    ACCOUNT_ADDRESS: '0x3333333333333333333333333333333333333333'
};

describe('loadConfig', () => {
    test('applies defaults', () => {
        expect(loadConfig(base)).toEqual({
            owner: '0x1111111111111111111111111111111111111111',
            dispatcher: '0x2222222222222222222222222222222222222222',
            account: '0x3333333333333333333333333333333333333333',
            port: 3000,
            eventDbPath: 'account-events.db',
            batchLimit: 10,
            nativeBalance: 0n,
            tokens: []
        });
    });

    test('parses ledger funding', () => {
        const config = loadConfig({
            ...base,
            LEDGER_NATIVE_BALANCE: '500',
            LEDGER_TOKENS: '0x4444444444444444444444444444444444444444:1000, 0x5555555555555555555555555555555555555555:0'
        });
        expect(config.nativeBalance).toBe(500n);
        expect(config.tokens).toEqual([
            { token: '0x4444444444444444444444444444444444444444', balance: 1000n },
            { token: '0x5555555555555555555555555555555555555555', balance: 0n }
        ]);
    });

    test('rejects malformed ledger funding', () => {
        expect(() => loadConfig({ ...base, LEDGER_TOKENS: '0x4444:12' })).toThrow('LEDGER_TOKENS: expected <address>:<amount>, got 0x4444:12');
    });

    test('coerces numeric settings from strings', () => {
        const config = loadConfig({ ...base, PORT: '8080', UPKEEP_BATCH_LIMIT: '25', EVENT_DB_PATH: '/tmp/events.db' });
        expect(config.port).toBe(8080);
        expect(config.batchLimit).toBe(25);
        expect(config.eventDbPath).toBe('/tmp/events.db');
    });

    test('reports every invalid field at once', () => {
        let caught: unknown;
        try {
            loadConfig({ ...base, OWNER_ADDRESS: 'not-an-address', UPKEEP_BATCH_LIMIT: '0' });
        } catch (e) {
            caught = e;
        }
        expect(caught).toMatchObject({
            code: ErrorCode.CONFIG_INVALID,
            metadata: {
                issues: [
                    'OWNER_ADDRESS: must be a 20-byte hex address',
                    'UPKEEP_BATCH_LIMIT: Number must be greater than or equal to 1'
                ]
            }
        });
    });

    test('requires the account principals', () => {
        expect(() => loadConfig({})).toThrow('OWNER_ADDRESS: Required');
    });
});
