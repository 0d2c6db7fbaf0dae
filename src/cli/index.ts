#!/usr/bin/env node
// src/cli/index.ts

import { program } from 'commander';
import { CONFIG } from '../config/config';
import { Logger } from '../core/logging/Logger';
import { adminCommand } from './commands/admin';
import { buildCommand } from './commands/build';
import { runCommand } from './commands/run';

program
    .name(CONFIG.HOST.NAME)
    .description('Plugin host: settings tree, module discovery and hot reloading')
    .version(CONFIG.HOST.VERSION);

program.addCommand(runCommand);
program.addCommand(buildCommand);
program.addCommand(adminCommand);

program.parseAsync().catch((error: unknown) => {
    Logger.error('CLI', 'Fatal error', error);
    process.exit(1);
});
