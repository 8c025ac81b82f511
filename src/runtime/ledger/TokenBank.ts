/**
 * Token Bank (in-memory ledger)
 *
 * Holds balances and allowances for any number of assets. The exchange
 * never touches it directly: it only sees the TokenLedger returned by
 * ledgerFor(poolAccount).
 */

import { logger } from '../../protocol/utils/logger.js';
import { ExchangeError } from '../../protocol/errors/ExchangeError.js';
import type { AccountId, AssetId, TokenLedger } from './TokenLedger.js';

const log = logger.child('Bank');

export interface TransferRecord {
    asset: AssetId;
    from: AccountId;
    to: AccountId;
    amount: bigint;
    operator: AccountId;
}

export type TransferHook = (transfer: TransferRecord) => void;

export interface TokenBankSnapshot {
    assets: Record<AssetId, {
        supply: string;
        balances: Record<AccountId, string>;
        allowances: Record<AccountId, Record<AccountId, string>>;
    }>;
}

interface AssetBook {
    supply: bigint;
    balances: Map<AccountId, bigint>;
    // owner -> spender -> amount
    allowances: Map<AccountId, Map<AccountId, bigint>>;
}

export class TokenBank {
    private books: Map<AssetId, AssetBook> = new Map();
    private hook: TransferHook | null = null;

    // ========== ISSUANCE ==========

    createAsset(asset: AssetId, initialSupply: bigint, holder: AccountId): void {
        if (this.books.has(asset)) {
            throw new Error(`Asset ${asset} already exists in bank`);
        }
        if (initialSupply < 0n) {
            throw new Error('Initial supply must be non-negative');
        }
        const book: AssetBook = { supply: 0n, balances: new Map(), allowances: new Map() };
        this.books.set(asset, book);
        if (initialSupply > 0n) {
            this.credit(book, holder, initialSupply);
            book.supply = initialSupply;
        }
        log.info(`🪙 Asset ${asset} created: ${initialSupply} → ${holder}`);
    }

    mint(asset: AssetId, to: AccountId, amount: bigint): void {
        if (amount <= 0n) throw new Error('Mint amount must be positive');
        const book = this.requireBook(asset);
        this.credit(book, to, amount);
        book.supply += amount;
        log.debug(`💧 Minted ${amount} ${asset} → ${to}`);
    }

    // ========== QUERIES ==========

    totalSupply(asset: AssetId): bigint {
        return this.books.get(asset)?.supply ?? 0n;
    }

    balanceOf(asset: AssetId, account: AccountId): bigint {
        return this.books.get(asset)?.balances.get(account) ?? 0n;
    }

    allowance(asset: AssetId, owner: AccountId, spender: AccountId): bigint {
        return this.books.get(asset)?.allowances.get(owner)?.get(spender) ?? 0n;
    }

    // ========== TRANSFERS ==========

    approve(asset: AssetId, owner: AccountId, spender: AccountId, amount: bigint): void {
        if (amount < 0n) throw new Error('Allowance must be non-negative');
        const book = this.requireBook(asset);
        const granted = book.allowances.get(owner) ?? new Map<AccountId, bigint>();
        granted.set(spender, amount);
        book.allowances.set(owner, granted);
    }

    /**
     * Called after every completed transfer, before control returns to the
     * caller of the ledger. Pass null to remove.
     */
    onTransfer(hook: TransferHook | null): void {
        this.hook = hook;
    }

    ledgerFor(operator: AccountId): TokenLedger {
        return {
            totalSupply: (asset) => this.totalSupply(asset),
            transferFrom: (asset, from, to, amount) => this.transferFrom(operator, asset, from, to, amount),
            transfer: (asset, to, amount) => this.move(operator, asset, operator, to, amount),
            atomic: <T>(fn: () => T): T => this.atomic(fn),
        };
    }

    atomic<T>(fn: () => T): T {
        const saved = this.cloneBooks();
        try {
            return fn();
        } catch (error) {
            this.books = saved;
            throw error;
        }
    }

    private transferFrom(operator: AccountId, asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
        const book = this.requireBook(asset);
        if (from !== operator) {
            const allowed = this.allowance(asset, from, operator);
            if (allowed < amount) {
                throw new ExchangeError('InsufficientAllowance', `${from} allows ${operator} ${allowed} ${asset}, needs ${amount}`);
            }
            this.ensureBalance(book, asset, from, amount);
            book.allowances.get(from)?.set(operator, allowed - amount);
            try {
                this.move(operator, asset, from, to, amount);
            } catch (error) {
                book.allowances.get(from)?.set(operator, allowed);
                throw error;
            }
            return;
        }
        this.move(operator, asset, from, to, amount);
    }

    private move(operator: AccountId, asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
        if (amount < 0n) throw new Error('Transfer amount must be non-negative');
        const book = this.requireBook(asset);
        this.ensureBalance(book, asset, from, amount);

        book.balances.set(from, (book.balances.get(from) ?? 0n) - amount);
        this.credit(book, to, amount);

        if (!this.hook) return;
        try {
            this.hook({ asset, from, to, amount, operator });
        } catch (error) {
            // a failing receiver callback reverts the transfer it observed
            book.balances.set(to, (book.balances.get(to) ?? 0n) - amount);
            this.credit(book, from, amount);
            throw error;
        }
    }

    private ensureBalance(book: AssetBook, asset: AssetId, account: AccountId, amount: bigint): void {
        const balance = book.balances.get(account) ?? 0n;
        if (balance < amount) {
            throw new ExchangeError('InsufficientBalance', `${account} holds ${balance} ${asset}, needs ${amount}`);
        }
    }

    private credit(book: AssetBook, account: AccountId, amount: bigint): void {
        book.balances.set(account, (book.balances.get(account) ?? 0n) + amount);
    }

    private requireBook(asset: AssetId): AssetBook {
        const book = this.books.get(asset);
        if (!book) {
            throw new ExchangeError('InsufficientBalance', `unknown asset ${asset}`);
        }
        return book;
    }

    private cloneBooks(): Map<AssetId, AssetBook> {
        const copy = new Map<AssetId, AssetBook>();
        for (const [asset, book] of this.books) {
            copy.set(asset, {
                supply: book.supply,
                balances: new Map(book.balances),
                allowances: new Map(
                    Array.from(book.allowances.entries()).map(([owner, spenders]) => [owner, new Map(spenders)])
                ),
            });
        }
        return copy;
    }

    // ========== SERIALIZATION ==========

    snapshot(): TokenBankSnapshot {
        const assets: TokenBankSnapshot['assets'] = {};
        for (const [asset, book] of this.books) {
            assets[asset] = {
                supply: book.supply.toString(),
                balances: Object.fromEntries(
                    Array.from(book.balances.entries()).map(([k, v]) => [k, v.toString()])
                ),
                allowances: Object.fromEntries(
                    Array.from(book.allowances.entries()).map(([owner, spenders]) => [
                        owner,
                        Object.fromEntries(Array.from(spenders.entries()).map(([s, v]) => [s, v.toString()])),
                    ])
                ),
            };
        }
        return { assets };
    }

    restore(data: TokenBankSnapshot): void {
        const books = new Map<AssetId, AssetBook>();
        for (const [asset, entry] of Object.entries(data.assets)) {
            books.set(asset, {
                supply: BigInt(entry.supply),
                balances: new Map(Object.entries(entry.balances).map(([k, v]) => [k, BigInt(v)])),
                allowances: new Map(
                    Object.entries(entry.allowances).map(([owner, spenders]) => [
                        owner,
                        new Map(Object.entries(spenders).map(([s, v]) => [s, BigInt(v)])),
                    ])
                ),
            });
        }
        this.books = books;
        log.info(`📂 Bank loaded: ${books.size} assets`);
    }
}
