#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { config } from '../config.js';
import { startNode } from './commands/start.js';
import { quoteCommand } from './commands/quote.js';
import { statusCommand } from './commands/status.js';
import { NODE_VERSION } from '../api/server.js';
import cli from '../../protocol/utils/cli.js';

const program = new Command();

program
    .name('xyk')
    .description('XYK Exchange - constant-product liquidity pools')
    .version(NODE_VERSION);

program
    .command('start')
    .description('Start the exchange node (HTTP API)')
    .option('-p, --port <number>', 'API server port', String(config.api.port))
    .option('-d, --data <path>', 'Data directory path', config.storage.dataDir)
    .option('--no-persist', 'Keep state in memory only')
    .action(async (options: { port: string; data: string; persist: boolean }) => {
        try {
            await startNode({
                apiPort: parseInt(options.port, 10),
                dataDir: options.data,
                persist: options.persist,
            });
        } catch (error) {
            cli.error(`Start failed: ${error instanceof Error ? error.message : 'Unknown'}`);
            process.exit(1);
        }
    });

program.addCommand(quoteCommand);
program.addCommand(statusCommand);

await program.parseAsync();
