import { AccessGate } from './interfaces.js';

export class ConfigAccessGate implements AccessGate {
    private readonly administrators: Set<string>;

    constructor(administrators: string[]) {
        this.administrators = new Set(administrators);
    }

    isAdministrator(account: string): boolean {
        return this.administrators.has(account);
    }
}
