import { AccountId } from '../surety/types.js';
import { FlightSuretyError } from '../errors/FlightSuretyError.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('AccessControl');

/**
 * Invoker gate shared by every core component.
 *
 * The owner is fixed at construction. Only the owner may change the invoker
 * set or the operational flag; the flag can be flipped back on while paused,
 * which makes it the manual circuit breaker.
 */
export class AccessControl {
    private operational = true;
    private readonly authorized = new Set<AccountId>();

    constructor(public readonly owner: AccountId) {
        if (!owner) {
            throw new Error('AccessControl requires an owner identity');
        }
    }

    public authorize(caller: AccountId, invoker: AccountId): void {
        this.requireOwner(caller, 'authorize');
        this.requireOperational();
        this.authorized.add(invoker);
        logger.info({ invoker }, 'Invoker authorized');
    }

    public revoke(caller: AccountId, invoker: AccountId): void {
        this.requireOwner(caller, 'revoke');
        this.requireOperational();
        this.authorized.delete(invoker);
        logger.info({ invoker }, 'Invoker revoked');
    }

    public setOperational(caller: AccountId, mode: boolean): void {
        this.requireOwner(caller, 'setOperational');
        if (this.operational === mode) return;
        this.operational = mode;
        logger.warn({ operational: mode }, mode ? 'Operations resumed' : 'Operations paused');
    }

    public isOperational(): boolean {
        return this.operational;
    }

    public isAuthorized(invoker: AccountId): boolean {
        return this.authorized.has(invoker);
    }

    /**
     * Guard for every mutating core operation: operational first, then invoker.
     */
    public requireCallable(invoker: AccountId): void {
        this.requireOperational();
        if (!this.authorized.has(invoker)) {
            logger.warn({ invoker }, 'Unauthorized invoker rejected');
            throw new FlightSuretyError('Unauthorized', `Invoker ${invoker} is not authorized`);
        }
    }

    public requireOperational(): void {
        if (!this.operational) {
            throw new FlightSuretyError('NotOperational', 'Operations are paused');
        }
    }

    private requireOwner(caller: AccountId, action: string): void {
        if (caller !== this.owner) {
            logger.warn({ caller, action }, 'Owner-only action rejected');
            throw new FlightSuretyError('Unauthorized', `Only the owner may ${action}`);
        }
    }
}
