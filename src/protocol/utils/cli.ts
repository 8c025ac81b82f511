/**
 * CLI Formatting Utility
 *
 * chalk for colour, boxen for panels, figures and log-symbols for glyphs
 * with fallbacks on terminals without Unicode.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    error: logSymbols.error,
    arrow: figures.arrowRight,
    swap: '💱',
    pool: '🏊',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOXES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function box(content: string, title?: string, options?: BoxenOptions): string {
    return boxen(content, {
        ...defaultBoxStyle,
        title,
        titleAlignment: 'center',
        ...options,
    });
}

export function errorBox(content: string, title?: string): string {
    return box(content, title || `${sym.error} Error`, { borderColor: 'red' });
}

export function header(title: string, emoji: string = sym.pool): string {
    return boxen(c.heading(`${emoji} XYK Exchange · ${title}`), {
        padding: { top: 0, bottom: 0, left: 2, right: 2 },
        borderStyle: 'round',
        borderColor: 'cyan',
    });
}

// ==================== MESSAGES ====================

export function error(msg: string): void {
    console.log(`${sym.error} ${c.error(msg)}`);
}

/**
 * Aligned "label: value" lines for a box body
 */
export function keyValues(rows: Array<[string, string]>): string {
    const width = Math.max(...rows.map(([key]) => key.length)) + 1;
    return rows.map(([key, value]) => `${c.label((key + ':').padEnd(width))} ${c.value(value)}`).join('\n');
}

export default {
    sym,
    c,
    box,
    errorBox,
    header,
    error,
    keyValues,
};
