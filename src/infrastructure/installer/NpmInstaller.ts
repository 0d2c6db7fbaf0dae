// src/infrastructure/installer/NpmInstaller.ts

import { CONFIG } from '../../config/config';
import type { Requirement } from '../../core/modules/Requirement';
import { NodeProcessRunner, ProcessRunner } from '../process/ProcessRunner';
import { InstallOptions, InstallResult, PackageInstaller } from './types';

export interface NpmInstallerOptions {
    npmPath?: string;
    timeoutMs?: number;
    runner?: ProcessRunner;
}

/**
 * Runs `npm install --no-save --prefix <root> name@range...`.
 */
export class NpmInstaller implements PackageInstaller {
    private readonly npmPath: string;
    private readonly timeoutMs: number;
    private readonly runner: ProcessRunner;

    constructor(private readonly prefix: string, options: NpmInstallerOptions = {}) {
        this.npmPath = options.npmPath ?? CONFIG.INSTALL.NPM_PATH;
        this.timeoutMs = options.timeoutMs ?? CONFIG.INSTALL.TIMEOUT_MS;
        this.runner = options.runner ?? new NodeProcessRunner();
    }

    public args(requirements: readonly Requirement[]): string[] {
        return [
            'install',
            '--no-save',
            '--no-audit',
            '--no-fund',
            '--prefix',
            this.prefix,
            ...requirements.map(requirement => requirement.toInstallSpec()),
        ];
    }

    public async install(requirements: readonly Requirement[], options: InstallOptions = {}): Promise<InstallResult> {
        const result = await this.runner.run(this.npmPath, this.args(requirements), {
            cwd: this.prefix,
            timeoutMs: this.timeoutMs,
            onLine: line => options.onOutput?.(line),
        });
        return {
            exitCode: result.exitCode,
            timedOut: result.timedOut,
            output: [result.stdout, result.stderr].filter(Boolean).join('\n'),
        };
    }
}
