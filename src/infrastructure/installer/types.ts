// src/infrastructure/installer/types.ts

import type { Requirement } from '../../core/modules/Requirement';

export interface InstallOptions {
    onOutput?: (line: string) => void;
}

export interface InstallResult {
    exitCode: number | null;
    timedOut: boolean;
    output: string;
}

/**
 * Installs packages into the module dependency root. Called only with
 * requirements that are not already satisfied.
 */
export interface PackageInstaller {
    install(requirements: readonly Requirement[], options?: InstallOptions): Promise<InstallResult>;
}
