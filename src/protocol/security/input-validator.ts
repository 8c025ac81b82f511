/**
 * Input Validator
 * Shape checks for API and CLI inputs before they reach the exchange
 */

const MAX_ASSET_LENGTH = 64;
const MAX_ACCOUNT_LENGTH = 128;
const MAX_AMOUNT_DIGITS = 78;   // fits a uint256

const ASSET_REGEX = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;
const ACCOUNT_REGEX = /^[A-Za-z0-9][A-Za-z0-9._:@-]*$/;
const AMOUNT_REGEX = /^\d+$/;

export type ValidationResult<T = undefined> =
    | { valid: true; value: T }
    | { valid: false; error: string };

export class InputValidator {
    /**
     * Validate asset identifier
     */
    validateAsset(asset: unknown, fieldName: string = 'asset'): ValidationResult<string> {
        if (typeof asset !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        if (asset.length === 0 || asset.length > MAX_ASSET_LENGTH) {
            return { valid: false, error: `${fieldName} must be 1-${MAX_ASSET_LENGTH} characters` };
        }
        if (!ASSET_REGEX.test(asset)) {
            return { valid: false, error: `${fieldName} contains invalid characters` };
        }
        return { valid: true, value: asset };
    }

    validateAccount(account: unknown, fieldName: string = 'account'): ValidationResult<string> {
        if (typeof account !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        if (account.length === 0 || account.length > MAX_ACCOUNT_LENGTH) {
            return { valid: false, error: `${fieldName} must be 1-${MAX_ACCOUNT_LENGTH} characters` };
        }
        if (!ACCOUNT_REGEX.test(account)) {
            return { valid: false, error: `${fieldName} contains invalid characters` };
        }
        return { valid: true, value: account };
    }

    /**
     * Integer amount from a decimal string or a safe integer.
     * Zero passes here; the exchange decides whether zero is acceptable.
     */
    validateAmount(amount: unknown, fieldName: string = 'amount'): ValidationResult<bigint> {
        if (typeof amount === 'number') {
            if (!Number.isSafeInteger(amount) || amount < 0) {
                return { valid: false, error: `${fieldName} must be a non-negative safe integer` };
            }
            return { valid: true, value: BigInt(amount) };
        }
        if (typeof amount !== 'string') {
            return { valid: false, error: `${fieldName} must be an integer string` };
        }
        const trimmed = amount.trim();
        if (!AMOUNT_REGEX.test(trimmed) || trimmed.length > MAX_AMOUNT_DIGITS) {
            return { valid: false, error: `${fieldName} must be a non-negative integer` };
        }
        return { valid: true, value: BigInt(trimmed) };
    }
}

export const inputValidator = new InputValidator();
