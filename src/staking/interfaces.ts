/** Depositor record as exposed on the read surface. */
export interface DepositorRecord {
    depositor: string;
    stakedAssets: string[];
    pendingReward: bigint;
    lastCheckpoint: number;
}

export interface StakingParams {
    rewardRatePerUnitTime: bigint; // reward units per staked asset per unit of time
    claimDelay: number; // minimum time since lastCheckpoint before a claim
    paused: boolean;
}

export interface AssetPosition {
    assetId: string;
    owner: string | null; // depositor while in custody
    unbondingInitiatedAt: number | null;
    holder: string | null; // current holder in the asset registry
}

/**
 * Fungible reward payout. Returns false when the payout did not happen.
 */
export interface RewardTransfer {
    transfer(to: string, amount: bigint): Promise<boolean>;
}

/**
 * Moves an asset between accounts. Rejects when the move did not happen.
 */
export interface AssetCustodyTransfer {
    transferCustody(from: string, to: string, assetId: string): Promise<void>;
}

export interface AccessGate {
    isAdministrator(account: string): boolean;
}

export interface PauseSwitch {
    isPaused(): boolean;
    setPaused(paused: boolean): void;
}
