export enum TransactionType {
  // Staking Transactions
  STAKING_STAKE = 1,
  STAKING_UNSTAKE = 2,
  STAKING_CLAIM_REWARDS = 3,

  // Admin Transactions
  ADMIN_UPDATE_REWARD_RATE = 10,
  ADMIN_UPDATE_CLAIM_DELAY = 11,
  ADMIN_PAUSE = 12,
  ADMIN_UNPAUSE = 13,
  ADMIN_MINT_ASSET = 14,
  ADMIN_FUND_REWARDS = 15
}
