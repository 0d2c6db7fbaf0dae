// src/cli/commands/run.ts

import { Command } from 'commander';
import { Logger } from '../../core/logging/Logger';
import { HostFlags, createHost, waitForSignal, withHostOptions } from './shared';

export const runCommand = withHostOptions(new Command('run'))
    .description('Start the host and load the enabled modules')
    .action(async (flags: HostFlags) => {
        const host = createHost(flags);
        const result = await host.start();
        if (result.status === 'unconfigured') {
            process.exitCode = 1;
            return;
        }
        if (result.report.failed.length > 0) {
            Logger.warn('CLI', `Modules that failed to load: ${result.report.failed.map(f => f.id).join(', ')}`);
        }

        const signal = await waitForSignal();
        Logger.info('CLI', `Received ${signal}`);
        await host.shutdown();
    });
