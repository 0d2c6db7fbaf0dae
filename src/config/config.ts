// src/config/config.ts

import path from 'path';
import { ENV } from './env';

/**
 * Helper to get the project root directory.
 * Derives the root from the file location to ensure consistency
 * even if the process is started from a different working directory.
 */
const PROJECT_ROOT = path.resolve(__dirname, '../..');

interface HostConfig {
    NAME: string;
    VERSION: string;
}

interface PathsConfig {
    PROJECT_ROOT: string;
    RESOURCES_DIR: string;
    CORE_SCHEMA: string;
    CORE_MODULES_DIR: string;
    DATA_DIR: string;
}

interface FilesConfig {
    SETTINGS: string;
    SETTINGS_SCHEMA: string;
    CORE_MANIFEST: string;
    PROJECT_MANIFEST: string;
    BUNDLE_EXTENSION: string;
}

interface ManifestConfig {
    MAX_ID_LENGTH: number;
    MAX_NAME_LENGTH: number;
    MAX_DESCRIPTION_LENGTH: number;
    MAX_LICENSE_LENGTH: number;
    MAX_AUTHOR_LENGTH: number;
    MANIFEST_FIELD: string;
}

interface InstallConfig {
    TIMEOUT_MS: number;
    NPM_PATH: string;
}

interface Config {
    HOST: HostConfig;
    PATHS: PathsConfig;
    FILES: FilesConfig;
    MANIFEST: ManifestConfig;
    INSTALL: InstallConfig;
}

const RESOURCES_DIR = path.join(PROJECT_ROOT, 'resources');

/**
 * Centralized configuration for Hearth.
 */
export const CONFIG: Config = {
    HOST: {
        NAME: 'hearth',
        VERSION: '0.1.0',
    },

    PATHS: {
        PROJECT_ROOT,
        RESOURCES_DIR,
        CORE_SCHEMA: path.join(RESOURCES_DIR, 'settings_schema.toml'),
        CORE_MODULES_DIR: path.join(RESOURCES_DIR, 'core_modules'),
        DATA_DIR: ENV.HEARTH_DATA_DIR ? path.resolve(ENV.HEARTH_DATA_DIR) : path.join(process.cwd(), 'data'),
    },

    FILES: {
        SETTINGS: 'settings.toml',
        SETTINGS_SCHEMA: 'settings_schema.toml',
        CORE_MANIFEST: 'manifest.toml',
        PROJECT_MANIFEST: 'package.json',
        BUNDLE_EXTENSION: '.ember',
    },

    MANIFEST: {
        MAX_ID_LENGTH: 32,
        MAX_NAME_LENGTH: 64,
        MAX_DESCRIPTION_LENGTH: 256,
        MAX_LICENSE_LENGTH: 64,
        MAX_AUTHOR_LENGTH: 64,
        // Key inside package.json that marks a directory as a Hearth module
        MANIFEST_FIELD: 'hearth',
    },

    INSTALL: {
        TIMEOUT_MS: ENV.HEARTH_INSTALL_TIMEOUT_MS,
        NPM_PATH: ENV.HEARTH_NPM_PATH,
    },
};
