import fs from 'fs';
import path from 'path';
import type { PairStoreSnapshot } from '../../runtime/pool/PairStore.js';
import type { TokenBankSnapshot } from '../../runtime/ledger/TokenBank.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Storage');

export const STATE_FILE = 'state.json';

export interface ExchangeState {
    exchange: PairStoreSnapshot;
    bank: TokenBankSnapshot;
}

export class Storage {
    private dataDir: string;
    private statePath: string;

    constructor(dataDir: string) {
        this.dataDir = dataDir;
        this.statePath = path.join(this.dataDir, STATE_FILE);
        this.ensureDirectories();
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    // Pair store and bank share one file and are replaced together
    saveState(state: ExchangeState): void {
        this.writeAtomic(this.statePath, state);
        log.debug('💾 State saved to disk');
    }

    loadState(): ExchangeState | null {
        return this.read(this.statePath, isExchangeState);
    }

    private writeAtomic(file: string, data: unknown): void {
        const tmp = `${file}.tmp`;
        fs.writeFileSync(tmp, JSON.stringify(data, null, 2));
        fs.renameSync(tmp, file);
    }

    private read<T>(file: string, guard: (value: unknown) => value is T): T | null {
        if (!fs.existsSync(file)) {
            return null;
        }
        const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        if (!guard(parsed)) {
            throw new Error(`Malformed state file: ${file}`);
        }
        return parsed;
    }
}

// ========== SHAPE CHECKS ==========

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIntegerString(value: unknown): value is string {
    return typeof value === 'string' && /^\d+$/.test(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
    return isRecord(value) && Object.values(value).every(isIntegerString);
}

export function isPairStoreSnapshot(value: unknown): value is PairStoreSnapshot {
    if (!isRecord(value)) return false;
    const { assets, pairs } = value;
    return Array.isArray(assets)
        && assets.every((a) => typeof a === 'string')
        && Array.isArray(pairs)
        && pairs.every((p: unknown) => isRecord(p)
            && typeof p.assetLow === 'string'
            && typeof p.assetHigh === 'string'
            && isIntegerString(p.reserveLow)
            && isIntegerString(p.reserveHigh));
}

export function isTokenBankSnapshot(value: unknown): value is TokenBankSnapshot {
    if (!isRecord(value) || !isRecord(value.assets)) return false;
    return Object.values(value.assets).every((entry) => isRecord(entry)
        && isIntegerString(entry.supply)
        && isStringMap(entry.balances)
        && isRecord(entry.allowances)
        && Object.values(entry.allowances).every(isStringMap));
}

export function isExchangeState(value: unknown): value is ExchangeState {
    return isRecord(value) && isPairStoreSnapshot(value.exchange) && isTokenBankSnapshot(value.bank);
}
