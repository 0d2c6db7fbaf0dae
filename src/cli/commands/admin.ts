// src/cli/commands/admin.ts

import { Command } from 'commander';
import { serveAdmin } from '../../interface/mcp/tools';
import { HostFlags, createHost, withHostOptions } from './shared';

export const adminCommand = withHostOptions(new Command('admin'))
    .description('Start the host and serve its admin tools over MCP on stdio')
    .action(async (flags: HostFlags) => {
        const host = createHost(flags);
        const result = await host.start();
        if (result.status === 'unconfigured') {
            process.exitCode = 1;
            return;
        }
        await serveAdmin(host);
    });
