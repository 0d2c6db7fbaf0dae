// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 * Everything here has a default so a fresh checkout runs without a .env file.
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Overrides the level derived from NODE_ENV
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // Root of settings.toml, modules/, storage/ and node_modules/
    HEARTH_DATA_DIR: z.string().min(1).optional(),

    // Dependency installation
    HEARTH_INSTALL_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
    HEARTH_NPM_PATH: z.string().min(1).default(process.platform === 'win32' ? 'npm.cmd' : 'npm'),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
