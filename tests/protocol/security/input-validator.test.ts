import { describe, it, expect } from 'vitest';
import { InputValidator } from '../../../src/protocol/security/input-validator.js';

const validator = new InputValidator();

describe('validateAsset', () => {
    it('accepts symbols and contract-like ids', () => {
        expect(validator.validateAsset('USDC')).toEqual({ valid: true, value: 'USDC' });
        expect(validator.validateAsset('erc20:0xabc')).toEqual({ valid: true, value: 'erc20:0xabc' });
    });
    it('rejects non-strings and bad characters', () => {
        expect(validator.validateAsset(5)).toEqual({ valid: false, error: 'asset must be a string' });
        expect(validator.validateAsset('')).toEqual({ valid: false, error: 'asset must be 1-64 characters' });
        expect(validator.validateAsset('a b', 'assetIn')).toEqual({ valid: false, error: 'assetIn contains invalid characters' });
        expect(validator.validateAsset('x'.repeat(65)).valid).toBe(false);
    });
});

describe('validateAccount', () => {
    it('accepts account names', () => {
        expect(validator.validateAccount('alice@test')).toEqual({ valid: true, value: 'alice@test' });
    });
    it('rejects control characters', () => {
        expect(validator.validateAccount('bob\n').valid).toBe(false);
    });
});

describe('validateAmount', () => {
    it('parses integer strings beyond the safe range', () => {
        expect(validator.validateAmount('123456789012345678901234567890')).toEqual({
            valid: true,
            value: 123456789012345678901234567890n,
        });
    });
    it('accepts safe integers and zero', () => {
        expect(validator.validateAmount(42)).toEqual({ valid: true, value: 42n });
        expect(validator.validateAmount('0')).toEqual({ valid: true, value: 0n });
    });
    it('rejects decimals, negatives and non-numbers', () => {
        expect(validator.validateAmount('1.5')).toEqual({ valid: false, error: 'amount must be a non-negative integer' });
        expect(validator.validateAmount(-1, 'amountIn')).toEqual({ valid: false, error: 'amountIn must be a non-negative safe integer' });
        expect(validator.validateAmount(1.5).valid).toBe(false);
        expect(validator.validateAmount(null)).toEqual({ valid: false, error: 'amount must be an integer string' });
    });
});
