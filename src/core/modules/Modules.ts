// src/core/modules/Modules.ts

import { existsSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { ErrorFactory, ManifestError, ModuleNotFoundError } from '../errors';
import { Logger } from '../logging/Logger';
import { extractBundle, readBundle } from './bundle';
import { Module } from './Module';
import { hasManifest, manifestFileFor } from './ModuleManifest';
import { ModuleHost } from './types';

export interface InstallBundleOptions {
    installPath: string;
    deleteSource?: boolean;
}

async function isDirectory(dir: string): Promise<boolean> {
    try {
        return (await fs.stat(dir)).isDirectory();
    } catch {
        // Missing paths are handled by the caller
        return false;
    }
}

/**
 * Registry of discovered modules, keyed by id. Constructed once by the host
 * and passed to whatever needs it.
 */
export class Modules implements Iterable<Module> {
    private modules: Map<string, Module> = new Map();

    public get size(): number {
        return this.modules.size;
    }

    public [Symbol.iterator](): IterableIterator<Module> {
        return this.modules.values();
    }

    public ids(): string[] {
        return [...this.modules.keys()];
    }

    public has(id: string): boolean {
        return this.modules.has(id);
    }

    public get(id: string): Module {
        const module = this.modules.get(id);
        if (!module) throw new ModuleNotFoundError(id);
        return module;
    }

    /**
     * Registers a module. Refuses an id that is already taken; the first one wins.
     */
    public add(module: Module): boolean {
        const existing = this.modules.get(module.id);
        if (existing) {
            Logger.warn('Modules', `Module id '${module.id}' at ${module.path} is already used by ${existing.path}, skipping`);
            return false;
        }
        this.modules.set(module.id, module);
        return true;
    }

    public remove(id: string): Module | undefined {
        const module = this.modules.get(id);
        this.modules.delete(id);
        return module;
    }

    public clear(): void {
        this.modules.clear();
    }

    /**
     * Forgets every module, then scans each search path in order.
     */
    public async discover(host: ModuleHost, searchPaths: readonly string[]): Promise<Module[]> {
        this.clear();
        const found: Module[] = [];
        for (const searchPath of searchPaths) {
            found.push(...await this.scan(host, searchPath));
        }
        return found;
    }

    /**
     * Registers the module at `searchPath` itself, or else every module directly
     * below it. Returns the modules added.
     */
    public async scan(host: ModuleHost, searchPath: string): Promise<Module[]> {
        const root = path.resolve(searchPath);
        if (!await isDirectory(root)) {
            Logger.warn('Modules', `Module directory ${root} does not exist, creating it`);
            await fs.mkdir(root, { recursive: true });
            return [];
        }

        const kind = Module.kindOf(root, host.paths.coreModulesDir);
        let candidates: string[];
        if (hasManifest(root, kind)) {
            candidates = [root];
        } else {
            const entries = await fs.readdir(root, { withFileTypes: true });
            candidates = entries
                .filter(entry => entry.isDirectory())
                .map(entry => path.join(root, entry.name))
                .sort()
                .filter(dir => hasManifest(dir, Module.kindOf(dir, host.paths.coreModulesDir)));
        }

        const added: Module[] = [];
        for (const candidate of candidates) {
            let module: Module;
            try {
                module = new Module(host, candidate);
            } catch (error) {
                if (!(error instanceof ManifestError)) throw error;
                Logger.warn('Modules', `Skipping ${candidate}: ${error.message}`, { issues: error.issues });
                continue;
            }
            if (this.add(module)) {
                Logger.debug('Modules', `Discovered ${module.id} at ${module.path}`);
                added.push(module);
            }
        }
        return added;
    }

    /**
     * Validates a bundle, extracts it to `<installPath>/<id>` and registers the module.
     */
    public async installBundle(host: ModuleHost, bundlePath: string, options: InstallBundleOptions): Promise<Module> {
        const { zip, manifest, kind } = readBundle(bundlePath);
        if (this.modules.has(manifest.id)) {
            throw ErrorFactory.bundle(`A module with the id '${manifest.id}' is already installed`, { operation: 'installBundle' });
        }

        const target = path.join(path.resolve(options.installPath), manifest.id);
        if (existsSync(target)) {
            throw ErrorFactory.bundle(`${target} already exists`, {
                operation: 'installBundle',
                suggestion: 'Remove the old module directory before installing the bundle',
            });
        }

        if (Module.kindOf(target, host.paths.coreModulesDir) !== kind) {
            throw ErrorFactory.bundle(`${bundlePath} carries ${manifestFileFor(kind)}, which modules in ${options.installPath} do not use`, {
                operation: 'installBundle',
            });
        }

        let module: Module;
        try {
            await extractBundle(zip, target);
            module = new Module(host, target);
        } catch (error) {
            // Leave no partial module directory behind
            await fs.rm(target, { recursive: true, force: true });
            const reason = error instanceof Error ? error.message : String(error);
            throw ErrorFactory.bundle(`Could not install ${bundlePath}: ${reason}`, { details: error, operation: 'installBundle' });
        }
        this.add(module);
        Logger.info('Modules', `Installed ${module.id} v${module.manifest.version} from ${bundlePath}`);

        if (options.deleteSource) await fs.unlink(bundlePath);
        return module;
    }
}
