import type { UnixSeconds } from '../../kernel-core/L0/Primitives.js';
import type { ISystemClock } from '../../Platform/Ports.js';

export class SystemClock implements ISystemClock {
    now(): UnixSeconds {
        return BigInt(Math.floor(Date.now() / 1000));
    }
}

/**
 * Clock that only moves when told to. Used for local simulation and tests.
 */
export class ManualClock implements ISystemClock {
    constructor(private current: UnixSeconds = 0n) { }

    now(): UnixSeconds {
        return this.current;
    }

    advance(seconds: bigint): UnixSeconds {
        if (seconds < 0n) throw new Error("Clock Error: cannot move backwards");
        this.current += seconds;
        return this.current;
    }
}
