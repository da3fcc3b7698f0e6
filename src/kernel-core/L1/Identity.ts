import { isZeroIdentity, sameIdentity } from '../L0/Crypto.js';
import type { Address } from '../L0/Primitives.js';

/**
 * The two principals of the account. Fixed at construction.
 * The owner signs operations; the dispatcher relays them.
 */
export class AccountIdentity {
    public readonly owner: Address;
    public readonly dispatcher: Address;

    constructor(owner: Address, dispatcher: Address) {
        if (isZeroIdentity(owner)) throw new Error("Identity Violation: owner cannot be the zero identity");
        if (isZeroIdentity(dispatcher)) throw new Error("Identity Violation: dispatcher cannot be the zero identity");
        this.owner = owner;
        this.dispatcher = dispatcher;
        Object.freeze(this);
    }

    public isOwner(caller: Address): boolean {
        return sameIdentity(caller, this.owner);
    }

    public isDispatcher(caller: Address): boolean {
        return sameIdentity(caller, this.dispatcher);
    }
}
