import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import * as dotenv from 'dotenv';
import type { Server } from 'http';
import { isAddress, isHex } from 'viem';
import type { Address, Hex } from 'viem';
import { z } from 'zod';
import { SubscriptionAccount } from '../kernel-core/Account.js';
import { AccountIdentity } from '../kernel-core/L1/Identity.js';
import { canonicalize } from '../kernel-core/L0/Crypto.js';
import { categoryOf, isKernelError } from '../kernel-core/Errors.js';
import type { ErrorCategory } from '../kernel-core/Errors.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { InMemoryLedger } from '../infrastructure/ledger/InMemoryLedger.js';
import { SystemClock } from '../infrastructure/clock/SystemClock.js';
import { loadConfig } from '../config/config.js';
import type { AccountConfig } from '../config/config.js';

// --- Request Schemas (bigints travel as decimal strings) ---
const address = z.string().refine((v): v is Address => isAddress(v, { strict: false }), { message: 'expected address' });
const hex = z.string().refine((v): v is Hex => isHex(v), { message: 'expected 0x-prefixed hex' });
const uint = z.union([
    z.string().regex(/^\d+$/),
    // Larger JSON numbers are already rounded by the parser; send those as strings
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)
]).transform(v => BigInt(v));

const CreateSubscriptionBody = z.object({
    beneficiary: address,
    token: address,
    amount: uint,
    initialDelay: uint,
    interval: uint
});

const ExecuteBody = z.object({
    target: address,
    value: uint.default('0'),
    payload: hex.default('0x')
});

const UpkeepBody = z.object({
    batch: z.array(uint)
});

const ValidateOperationBody = z.object({
    op: z.object({
        sender: address,
        nonce: uint,
        callData: hex,
        callGasLimit: uint,
        verificationGasLimit: uint,
        preVerificationGas: uint,
        maxFeePerGas: uint,
        maxPriorityFeePerGas: uint,
        paymasterAndData: hex,
        signature: hex
    }),
    opDigest: hex,
    missingFunds: uint.default('0')
});

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    AUTHORIZATION: 403,
    INPUT: 400,
    CONCURRENCY: 409,
    EXECUTION: 422,
    ENVIRONMENT: 500
};

class BadRequest extends Error { }

// body-parser tags the errors it raises with a `type`
function isMalformedBody(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

export class AccountServer {
    public readonly app: express.Express;
    private server: Server | null = null;

    constructor(private account: SubscriptionAccount, private port: number = 3000, private onStop?: () => void) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    /**
     * Wires the account against the SQLite event store and the in-process ledger,
     * funded with the balances named in the config.
     */
    public static fromConfig(config: AccountConfig): AccountServer {
        const eventStore = new SQLiteEventStore(config.eventDbPath);
        const ledger = new InMemoryLedger();
        ledger.mint(config.account, config.nativeBalance);
        for (const { token, balance } of config.tokens) {
            ledger.mintToken(token, config.account, balance);
            console.log(`[AccountServer] Ledger token ${token} funded with ${balance}`);
        }
        const account = new SubscriptionAccount({
            identity: new AccountIdentity(config.owner, config.dispatcher),
            invoker: ledger.invokerFor(config.account),
            clock: new SystemClock(),
            eventStore,
            batchLimit: config.batchLimit
        });
        return new AccountServer(account, config.port, () => eventStore.close());
    }

    public async start(): Promise<Server> {
        await this.account.restore();

        return new Promise(resolve => {
            const server = this.app.listen(this.port, () => {
                console.log(`[AccountServer] Listening on port ${this.port}`);
                resolve(server);
            });
            this.server = server;
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (server) {
            await new Promise<void>((resolve, reject) => server.close(err => err ? reject(err) : resolve()));
        }
        this.onStop?.();
    }

    private send(res: Response, status: number, body: unknown) {
        res.status(status).type('application/json').send(canonicalize(body));
    }

    private handle(fn: Handler) {
        return async (req: Request, res: Response) => {
            try {
                await fn(req, res);
            } catch (e) {
                this.sendError(res, e);
            }
        };
    }

    private sendError(res: Response, e: unknown) {
        if (isKernelError(e)) {
            this.send(res, STATUS_BY_CATEGORY[categoryOf(e.code)], { error: e.message, code: e.code, metadata: e.metadata ?? {} });
            return;
        }
        if (e instanceof z.ZodError) {
            this.send(res, 400, { error: 'Invalid request', issues: e.issues.map(i => `${i.path.join('.')}: ${i.message}`) });
            return;
        }
        if (e instanceof BadRequest) {
            this.send(res, 400, { error: e.message });
            return;
        }
        console.error('[AccountServer] Unhandled error:', e);
        this.send(res, 500, { error: e instanceof Error ? e.message : String(e) });
    }

    private caller(req: Request): Address {
        const header = req.header('x-caller');
        if (!header || !isAddress(header, { strict: false })) throw new BadRequest('Missing or malformed x-caller header');
        return header;
    }

    private idParam(req: Request): bigint {
        const raw = req.params['id'] ?? '';
        if (!/^\d+$/.test(raw)) throw new BadRequest(`Malformed subscription id: ${raw}`);
        return BigInt(raw);
    }

    private setupRoutes() {
        this.app.use((req: Request, _res: Response, next: NextFunction) => {
            console.log(`[AccountServer] ${req.method} ${req.url}`);
            next();
        });

        this.app.get('/account', this.handle((_req, res) => {
            this.send(res, 200, {
                owner: this.account.owner,
                dispatcher: this.account.dispatcher,
                totalSubscriptions: this.account.totalSubscriptions,
                batchLimit: this.account.batchLimit
            });
        }));

        // Registry
        this.app.get('/subscriptions', this.handle((_req, res) => {
            this.send(res, 200, this.account.listSubscriptions());
        }));

        this.app.get('/subscriptions/:id', this.handle((req, res) => {
            const sub = this.account.getSubscription(this.idParam(req));
            if (!sub) {
                this.send(res, 404, { error: 'Subscription not found' });
                return;
            }
            this.send(res, 200, sub);
        }));

        this.app.get('/subscriptions/:id/activity', this.handle((req, res) => {
            const activity = this.account.getActivity(this.idParam(req));
            if (!activity) {
                this.send(res, 404, { error: 'No activity recorded' });
                return;
            }
            this.send(res, 200, activity);
        }));

        this.app.post('/subscriptions', this.handle(async (req, res) => {
            const caller = this.caller(req);
            const terms = CreateSubscriptionBody.parse(req.body);
            const id = await this.account.createSubscription(caller, terms);
            this.send(res, 201, { id });
        }));

        this.app.delete('/subscriptions/:id', this.handle(async (req, res) => {
            const caller = this.caller(req);
            const id = this.idParam(req);
            await this.account.cancelSubscription(caller, id);
            this.send(res, 200, { id, cancelled: true });
        }));

        // Upkeep
        this.app.get('/upkeep', this.handle((_req, res) => {
            this.send(res, 200, this.account.checkUpkeep());
        }));

        this.app.post('/upkeep', this.handle(async (req, res) => {
            const { batch } = UpkeepBody.parse(req.body);
            this.send(res, 200, await this.account.performUpkeep(batch));
        }));

        // Account operations
        this.app.post('/execute', this.handle(async (req, res) => {
            const caller = this.caller(req);
            const { target, value, payload } = ExecuteBody.parse(req.body);
            const returndata = await this.account.execute(caller, target, value, payload);
            this.send(res, 200, { returndata });
        }));

        this.app.post('/operations/validate', this.handle(async (req, res) => {
            const caller = this.caller(req);
            const { op, opDigest, missingFunds } = ValidateOperationBody.parse(req.body);
            const validationData = await this.account.validateOperation(caller, op, opDigest, missingFunds);
            this.send(res, 200, { validationData });
        }));

        // Audit
        this.app.get('/events', this.handle(async (_req, res) => {
            this.send(res, 200, await this.account.log.getHistory());
        }));

        this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
            if (res.headersSent) {
                next(err);
                return;
            }
            if (isMalformedBody(err)) {
                this.send(res, 400, { error: 'Malformed JSON body' });
                return;
            }
            this.sendError(res, err);
        });
    }
}

// Start if run directly
if (require.main === module) {
    dotenv.config();
    const server = AccountServer.fromConfig(loadConfig());
    server.start().catch(e => {
        console.error('[AccountServer] Failed to start:', e);
        process.exitCode = 1;
    });
}
