import { LeveledLogMethod } from 'winston';

// Custom levels registered in logger.ts
declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        perf: LeveledLogMethod;
        trace: LeveledLogMethod;
        cons: LeveledLogMethod;
    }
}
