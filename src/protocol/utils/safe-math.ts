/**
 * Checked bigint arithmetic for reserve math.
 */
export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        if (a < 0n || b < 0n) throw new RangeError('Negative operand');
        return a + b;
    },
    sub(a: bigint, b: bigint): bigint {
        if (b > a) throw new RangeError('Underflow');
        return a - b;
    },
    mul(a: bigint, b: bigint): bigint {
        if (a < 0n || b < 0n) throw new RangeError('Negative operand');
        return a * b;
    },
    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new RangeError('Division by zero');
        return a / b;
    },
};
