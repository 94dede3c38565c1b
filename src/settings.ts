// Runtime settings sourced from environment variables
import config from './config.js';

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const useMongo: boolean = process.env.USE_MONGO === 'true';
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'nft-staking';
export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
export const adminAccounts: string[] = process.env.ADMIN_ACCOUNTS
    ? process.env.ADMIN_ACCOUNTS.split(',').map(s => s.trim()).filter(Boolean)
    : [config.adminAccount];
// Genesis parameters, only read when the state store is empty; checked by StakingController.initialize
export const rewardRate: string = process.env.REWARD_RATE || config.rewardRatePerUnitTime;
export const claimDelay: number = process.env.CLAIM_DELAY ? Number(process.env.CLAIM_DELAY) : config.claimDelay;

export default {
    apiPort,
    logLevel,
    useMongo,
    mongoUrl,
    mongoDb,
    useNotification,
    adminAccounts,
    rewardRate,
    claimDelay,
};
