/**
 * Offline quote: runs the pricing function on reserves given on the
 * command line, with the configured fee.
 */

import { Command } from 'commander';
import { loadExchangeParams } from '../../../protocol/params/exchange.js';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { quoteWithDetails } from '../../../runtime/pool/index.js';
import cli, { c, sym } from '../../../protocol/utils/cli.js';

export function formatBps(bps: bigint): string {
    const whole = bps / 100n;
    const frac = (bps % 100n).toString().padStart(2, '0');
    return `${whole}.${frac}%`;
}

export const quoteCommand = new Command('quote')
    .description('Price a swap against the given reserves')
    .argument('<amountIn>', 'Input amount (integer)')
    .argument('<reserveIn>', 'Pool reserve of the input asset')
    .argument('<reserveOut>', 'Pool reserve of the output asset')
    .action((amountInArg: string, reserveInArg: string, reserveOutArg: string) => {
        const parsed = [
            inputValidator.validateAmount(amountInArg, 'amountIn'),
            inputValidator.validateAmount(reserveInArg, 'reserveIn'),
            inputValidator.validateAmount(reserveOutArg, 'reserveOut'),
        ];
        const values: bigint[] = [];
        for (const result of parsed) {
            if (!result.valid) {
                cli.error(result.error);
                process.exitCode = 1;
                return;
            }
            values.push(result.value);
        }
        const [amountIn, reserveIn, reserveOut] = values;

        const { fee } = loadExchangeParams();
        try {
            const quote = quoteWithDetails(amountIn, reserveIn, reserveOut, fee);
            console.log(cli.box(cli.keyValues([
                ['Amount in', quote.amountIn.toString()],
                ['Amount out', c.highlight(quote.amountOut.toString())],
                ['Fee', `${quote.fee} (${fee.numerator}/${fee.denominator})`],
                ['Price impact', formatBps(quote.priceImpactBps)],
                ['Reserves', `${reserveIn} / ${reserveOut} ${sym.arrow} ${reserveIn + amountIn} / ${reserveOut - quote.amountOut}`],
            ]), `${sym.swap} Quote`));
        } catch (error) {
            cli.error(`Quote failed: ${error instanceof Error ? error.message : 'Unknown'}`);
            process.exitCode = 1;
        }
    });
