import { StateCache } from '../cache.js';
import config from '../config.js';
import { EventDocument } from '../models/index.js';
import { ConfigAccessGate } from './access.js';
import { AssetRegistry } from './asset-registry.js';
import { AssetCustodyLedger } from './custody.js';
import { AccessGate, AssetCustodyTransfer, PauseSwitch, RewardTransfer } from './interfaces.js';
import { StakingLedger } from './ledger.js';
import { ParamsStore } from './params.js';
import { RewardAccrualEngine } from './rewards.js';
import { RewardToken } from './reward-token.js';
import { UnbondingTracker } from './unbonding.js';

/**
 * Everything a transaction handler may touch. Collaborators are interfaces so that an
 * embedding host can substitute its own transfer plumbing.
 */
export interface StakingServices {
    cache: StateCache;
    params: ParamsStore;
    custody: AssetCustodyLedger;
    unbonding: UnbondingTracker;
    ledger: StakingLedger;
    registry: AssetRegistry;
    rewardToken: RewardToken;
    assetTransfer: AssetCustodyTransfer;
    rewardTransfer: RewardTransfer;
    access: AccessGate;
    pause: PauseSwitch;
    vaultAccount: string;
}

/** Services plus the events recorded by the operation in flight. */
export interface OperationContext extends StakingServices {
    events: EventDocument[];
}

export interface StakingServicesOptions {
    administrators?: string[];
    access?: AccessGate;
    assetTransfer?: AssetCustodyTransfer;
    rewardTransfer?: RewardTransfer;
    pause?: PauseSwitch;
    vaultAccount?: string;
    rewardPoolAccount?: string;
}

export function createStakingServices(cache: StateCache, options: StakingServicesOptions = {}): StakingServices {
    const params = new ParamsStore(cache);
    const registry = new AssetRegistry(cache);
    const rewardToken = new RewardToken(cache, options.rewardPoolAccount ?? config.rewardPoolAccount);
    return {
        cache,
        params,
        custody: new AssetCustodyLedger(cache),
        unbonding: new UnbondingTracker(cache),
        ledger: new StakingLedger(cache, new RewardAccrualEngine(params)),
        registry,
        rewardToken,
        assetTransfer: options.assetTransfer ?? registry,
        rewardTransfer: options.rewardTransfer ?? rewardToken,
        access: options.access ?? new ConfigAccessGate(options.administrators ?? [config.adminAccount]),
        pause: options.pause ?? params,
        vaultAccount: options.vaultAccount ?? config.vaultAccount,
    };
}
