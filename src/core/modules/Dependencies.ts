// src/core/modules/Dependencies.ts

import fs from 'fs/promises';
import path from 'path';
import { Mutex } from 'async-mutex';
import { ErrorFactory } from '../errors';
import { Logger, ScopedLogger } from '../logging/Logger';
import type { PackageInstaller } from '../../infrastructure/installer/types';
import { Requirement } from './Requirement';

/**
 * Resolves module requirements against the dependency root and installs the
 * missing ones. Installs are serialized: npm does not tolerate two runs on
 * one prefix.
 */
export class Dependencies {
    private readonly installMutex = new Mutex();

    constructor(
        public readonly root: string,
        private readonly installer: PackageInstaller,
    ) { }

    /**
     * Version of an installed package, or null when it is absent or unreadable.
     */
    public async installedVersion(name: string): Promise<string | null> {
        const file = path.join(this.root, 'node_modules', ...name.split('/'), 'package.json');
        try {
            const pkg: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
            if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                return pkg.version;
            }
            return null;
        } catch (error) {
            Logger.debug('Dependencies', `${name} is not installed under ${this.root}`, { reason: String(error) });
            return null;
        }
    }

    public async missing(requirements: readonly Requirement[]): Promise<Requirement[]> {
        const missing: Requirement[] = [];
        for (const requirement of requirements) {
            const version = await this.installedVersion(requirement.name);
            if (!requirement.satisfiedBy(version)) missing.push(requirement);
        }
        return missing;
    }

    /**
     * Installs whatever is not yet satisfied and returns what was installed.
     * No subprocess runs when nothing is missing.
     */
    public async ensure(requirements: readonly Requirement[], logger: ScopedLogger): Promise<Requirement[]> {
        return this.installMutex.runExclusive(async () => {
            const missing = await this.missing(requirements);
            if (missing.length === 0) return [];

            const list = missing.map(String).join(', ');
            logger.info(`Installing dependencies: ${list}`);
            await fs.mkdir(this.root, { recursive: true });

            const result = await this.installer.install(missing, { onOutput: line => logger.debug(line) });
            if (result.timedOut) {
                throw ErrorFactory.install(`Installing ${list} timed out`, result, { operation: 'ensure' });
            }
            if (result.exitCode !== 0) {
                throw ErrorFactory.install(
                    `Installing ${list} failed with exit code ${result.exitCode ?? 'none'}`,
                    result,
                    { operation: 'ensure', suggestion: 'Check the module logger output for the installer messages' },
                );
            }
            logger.info(`Installed ${list}`);
            return missing;
        });
    }
}
