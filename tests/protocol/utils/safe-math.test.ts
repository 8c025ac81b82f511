import { describe, it, expect } from 'vitest';
import { SafeMath } from '../../../src/protocol/utils/safe-math.js';

describe('SafeMath', () => {
    it('add works correctly', () => {
        expect(SafeMath.add(10n, 20n)).toBe(30n);
    });
    it('sub works correctly', () => {
        expect(SafeMath.sub(30n, 10n)).toBe(20n);
    });
    it('sub throws on underflow', () => {
        expect(() => SafeMath.sub(10n, 20n)).toThrow('Underflow');
    });
    it('mul rejects negative operands', () => {
        expect(() => SafeMath.mul(-1n, 5n)).toThrow('Negative operand');
    });
    it('div throws on division by zero', () => {
        expect(() => SafeMath.div(10n, 0n)).toThrow('Division by zero');
    });
});
