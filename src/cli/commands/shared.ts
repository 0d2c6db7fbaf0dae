// src/cli/commands/shared.ts

import { Command } from 'commander';
import { Host } from '../../host/Host';

export interface HostFlags {
    include?: string[];
    dataDir?: string;
    settingsFile?: string;
}

export function withHostOptions(command: Command): Command {
    return command
        .option('-i, --include <paths...>', 'additional module directories to scan')
        .option('-d, --data-dir <path>', 'directory holding settings, modules and storage')
        .option('-s, --settings-file <path>', 'settings file to use instead of <data-dir>/settings.toml');
}

export function createHost(flags: HostFlags): Host {
    return new Host({
        includePaths: flags.include,
        dataDir: flags.dataDir,
        settingsFile: flags.settingsFile,
    });
}

/**
 * Resolves on the first SIGINT or SIGTERM.
 */
export function waitForSignal(): Promise<NodeJS.Signals> {
    return new Promise(resolve => {
        process.once('SIGINT', () => resolve('SIGINT'));
        process.once('SIGTERM', () => resolve('SIGTERM'));
    });
}
