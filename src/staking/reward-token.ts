import { StateCache } from '../cache.js';
import logger from '../logger.js';
import { CheckedMath, toBigInt, toDbString } from '../utils/bigint.js';
import { RewardTransfer } from './interfaces.js';

/**
 * Reward token balances. Payouts are debited from the pool account.
 */
export class RewardToken implements RewardTransfer {
    constructor(
        private readonly cache: StateCache,
        readonly poolAccount: string
    ) {}

    balanceOf(account: string): bigint {
        return toBigInt(this.cache.findOne('accounts', account)?.balance);
    }

    get poolBalance(): bigint {
        return this.balanceOf(this.poolAccount);
    }

    /**
     * Adds `amount` (negative to debit) to an account, creating it on first credit.
     * @returns false when the balance would go below zero
     */
    adjustBalance(account: string, amount: bigint): boolean {
        const existing = this.cache.findOne('accounts', account);
        const currentBalance = toBigInt(existing?.balance);
        const newBalance = CheckedMath.add(currentBalance, amount);
        if (newBalance < 0n) {
            logger.warn(`[reward-token] Insufficient balance for ${account}: ${currentBalance} + ${amount} = ${newBalance}`);
            return false;
        }
        const timestamp = new Date().toISOString();
        if (existing) {
            this.cache.updateOne('accounts', account, { balance: toDbString(newBalance), lastUpdatedAt: timestamp });
        } else {
            this.cache.insertOne('accounts', { _id: account, balance: toDbString(newBalance), createdAt: timestamp, lastUpdatedAt: timestamp });
        }
        logger.trace(`[reward-token] Updated balance for ${account}: ${currentBalance} -> ${newBalance}`);
        return true;
    }

    async transfer(to: string, amount: bigint): Promise<boolean> {
        if (amount < 0n) return false;
        if (amount === 0n) return true;
        if (!this.adjustBalance(this.poolAccount, -amount)) return false;
        return this.adjustBalance(to, amount);
    }
}
