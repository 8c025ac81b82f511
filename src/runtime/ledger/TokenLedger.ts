/**
 * Value-transfer capability the exchange depends on.
 *
 * One ledger instance acts on behalf of a single operator account (the
 * pool): `transferFrom` spends an allowance granted to that operator and
 * `transfer` sends from the operator's own balance. Implementations raise
 * `ExchangeError` with `InsufficientBalance` / `InsufficientAllowance`.
 */

export type AssetId = string;
export type AccountId = string;

export interface TokenLedger {
    totalSupply(asset: AssetId): bigint;
    transferFrom(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void;
    transfer(asset: AssetId, to: AccountId, amount: bigint): void;
    /**
     * Run several transfers as one unit: if fn throws, every transfer made
     * inside it is undone before the error is rethrown. Ledgers without it
     * get compensating transfers instead.
     */
    atomic?<T>(fn: () => T): T;
}
