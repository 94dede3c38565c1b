const config = {
    networkName: 'NFT Staking Devnet',
    rewardTokenSymbol: 'RWD',
    rewardTokenPrecision: 8,
    adminAccount: 'staking-admin',
    vaultAccount: 'staking-vault',
    rewardPoolAccount: 'reward-pool',
    rewardPoolBalance: '100000000000000', // 1,000,000 RWD
    rewardRatePerUnitTime: '10',
    claimDelay: 100,
    maxValue: '999999999999999999999999999999',
    maxBatchSize: 50,
    assetIdMaxLength: 128,
    accountNameMaxLength: 64,
    accountNameMinLength: 1,
    eventsMaxPageSize: 100,
    maxPayloadLength: 16384
};

export default config;
