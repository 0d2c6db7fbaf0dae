// src/cli/commands/build.ts

import { Command } from 'commander';
import { buildBundle } from '../../core/modules/bundle';

export const buildCommand = new Command('build')
    .description('Package a module directory as an installable .ember bundle')
    .argument('[path]', 'module directory', '.')
    .option('-o, --out-dir <path>', 'where to write the bundle (default: <path>/dist)')
    .action(async (modulePath: string, flags: { outDir?: string }) => {
        const outPath = await buildBundle(modulePath, { outDir: flags.outDir });
        console.log(outPath);
    });
