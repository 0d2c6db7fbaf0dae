// tests/helpers/fixtures.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import semver from 'semver';
import { ExtensionImporter } from '../../src/core/extensions/ExtensionImporter';
import { Requirement } from '../../src/core/modules/Requirement';
import { InstallOptions, InstallResult, PackageInstaller } from '../../src/infrastructure/installer/types';

export function makeTempDir(prefix = 'hearth-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export interface ProjectModuleOptions {
    version?: string;
    dependencies?: Record<string, string>;
    schema?: string;
}

/**
 * Writes `<parent>/<dirName>/package.json` with a `hearth` field, plus an optional schema.
 */
export function writeProjectModule(parent: string, id: string, options: ProjectModuleOptions = {}, dirName = id): string {
    const dir = path.join(parent, dirName);
    fs.mkdirSync(dir, { recursive: true });
    const pkg = {
        name: `hearth-${id}`,
        version: options.version ?? '1.0.0',
        description: `The ${id} module`,
        dependencies: options.dependencies ?? {},
        hearth: { id },
    };
    fs.writeFileSync(path.join(dir, 'package.json'), JSON.stringify(pkg, null, 2));
    if (options.schema !== undefined) {
        fs.writeFileSync(path.join(dir, 'settings_schema.toml'), options.schema);
    }
    return dir;
}

export function writeCoreModule(parent: string, id: string, dependencies: string[] = []): string {
    const dir = path.join(parent, id);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'manifest.toml'), [
        'manifest_version = 1',
        '',
        '[module]',
        `id = "${id}"`,
        `name = "${id} module"`,
        `dependencies = [${dependencies.map(d => JSON.stringify(d)).join(', ')}]`,
        '',
    ].join('\n'));
    return dir;
}

/**
 * Serves extension exports from memory, keyed by resolved module directory.
 */
export class MemoryImporter implements ExtensionImporter {
    public readonly entries = new Map<string, unknown>();
    public readonly evicted: string[] = [];
    public loads = 0;

    public set(request: string, exports: unknown): void {
        this.entries.set(path.resolve(request), exports);
    }

    public resolve(request: string): string {
        const key = path.resolve(request);
        if (!this.entries.has(key)) throw new Error(`Cannot find module '${request}'`);
        return key;
    }

    public async load(resolved: string): Promise<unknown> {
        this.loads++;
        return this.entries.get(resolved);
    }

    public evict(root: string): void {
        this.evicted.push(root);
    }
}

/**
 * Records install calls. On success it writes the lowest matching version of
 * each package into `<root>/node_modules`, as npm would.
 */
export class FakeInstaller implements PackageInstaller {
    public readonly calls: string[][] = [];
    public readonly output: string[] = [];
    public result: InstallResult = { exitCode: 0, timedOut: false, output: '' };

    constructor(private readonly root: string | null = null) { }

    public async install(requirements: readonly Requirement[], options: InstallOptions = {}): Promise<InstallResult> {
        this.calls.push(requirements.map(String));
        options.onOutput?.('fake install output');
        if (this.result.exitCode === 0 && !this.result.timedOut && this.root !== null) {
            for (const requirement of requirements) {
                const dir = path.join(this.root, 'node_modules', requirement.name);
                fs.mkdirSync(dir, { recursive: true });
                const version = semver.minVersion(requirement.range)?.version ?? '1.0.0';
                fs.writeFileSync(path.join(dir, 'package.json'), JSON.stringify({ name: requirement.name, version }));
            }
        }
        return this.result;
    }
}
