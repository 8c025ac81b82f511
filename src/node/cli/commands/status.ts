import { Command } from 'commander';
import cli, { c } from '../../../protocol/utils/cli.js';

interface HealthResponse {
    success: boolean;
    data: {
        status: string;
        version: string;
        uptime: number;
        assets: number;
        pairs: number;
    };
}

function isHealthResponse(value: unknown): value is HealthResponse {
    if (typeof value !== 'object' || value === null || !('data' in value)) return false;
    const data = value.data;
    return typeof data === 'object' && data !== null
        && 'status' in data && typeof data.status === 'string'
        && 'version' in data && typeof data.version === 'string'
        && 'uptime' in data && typeof data.uptime === 'number'
        && 'assets' in data && typeof data.assets === 'number'
        && 'pairs' in data && typeof data.pairs === 'number';
}

export async function showStatus(port: number): Promise<void> {
    try {
        const response = await fetch(`http://localhost:${port}/health`);
        const health: unknown = await response.json();
        if (!isHealthResponse(health)) {
            console.log(cli.errorBox(`Unexpected health response from port ${port}`, '🔴 Error'));
            process.exitCode = 1;
            return;
        }

        console.log(cli.box(cli.keyValues([
            ['Status', health.data.status === 'healthy' ? c.success('🟢 Running') : c.error('🔴 Error')],
            ['Version', health.data.version],
            ['Uptime', `${Math.floor(health.data.uptime)}s`],
            ['Assets', String(health.data.assets)],
            ['Pairs', String(health.data.pairs)],
        ]), 'Node Status'));
    } catch {
        console.log(cli.errorBox(`Node is not running on port ${port}`, '🔴 Offline'));
        process.exitCode = 1;
    }
}

export const statusCommand = new Command('status')
    .description('Show node status')
    .option('-p, --port <number>', 'API server port', '3001')
    .action(async (options: { port: string }) => {
        await showStatus(parseInt(options.port, 10));
    });
