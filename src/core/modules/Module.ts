// src/core/modules/Module.ts

import fs from 'fs';
import path from 'path';
import { Mutex } from 'async-mutex';
import { CONFIG } from '../../config/config';
import { ExtensionAlreadyLoadedError, ExtensionNotLoadedError } from '../errors';
import { Logger, ScopedLogger } from '../logging/Logger';
import type { LoadTarget } from '../extensions/ExtensionLoader';
import type { SettingsGroup } from '../settings/SettingsGroup';
import { ManifestKind, ModuleManifest, readManifest } from './ModuleManifest';
import { ModuleHost, ModuleState } from './types';

/**
 * Whether `dir` lies inside `root` (or is `root`).
 */
export function isInside(dir: string, root: string): boolean {
    const relative = path.relative(path.resolve(root), path.resolve(dir));
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Dotted key for a module directory: its path relative to the working
 * directory (or its absolute path when outside it), separators replaced by dots.
 */
export function toImportString(modulePath: string, cwd: string = process.cwd()): string {
    const resolved = path.resolve(modulePath);
    const base = isInside(resolved, cwd) ? path.relative(cwd, resolved) : resolved;
    return base.split(/[\\/]+/).filter(Boolean).join('.');
}

/**
 * A module directory plus its manifest and lifecycle state. Lifecycle calls on
 * one module never overlap.
 */
export class Module {
    public readonly path: string;
    public readonly importString: string;
    public readonly manifest: ModuleManifest;
    public readonly logger: ScopedLogger;
    public loaded = false;
    public state: ModuleState = 'unloaded';

    private readonly lifecycle = new Mutex();

    /**
     * Reads and validates the manifest synchronously.
     * @throws {ManifestError} when the manifest is missing or invalid
     */
    constructor(public readonly host: ModuleHost, modulePath: string) {
        this.path = path.resolve(modulePath);
        this.importString = toImportString(this.path);
        this.manifest = readManifest(this.path, Module.kindOf(this.path, host.paths.coreModulesDir));
        this.logger = Logger.scope(`modules.${this.manifest.id}`);
    }

    public static kindOf(modulePath: string, coreModulesDir: string): ManifestKind {
        return isInside(modulePath, coreModulesDir) ? 'core' : 'project';
    }

    public get id(): string {
        return this.manifest.id;
    }

    /**
     * This module's subtree, `settings.<id>`.
     */
    public get settings(): SettingsGroup {
        return this.host.settings.getChild(this.id, true);
    }

    /**
     * Private storage directory, created on first access.
     */
    public get storagePath(): string {
        const dir = path.join(this.host.paths.storageDir, this.id);
        fs.mkdirSync(dir, { recursive: true });
        return dir;
    }

    public toString(): string {
        return `<Module ${this.id} ${this.state}>`;
    }

    public async load(): Promise<void> {
        return this.lifecycle.runExclusive(async () => {
            if (this.loaded) throw new ExtensionAlreadyLoadedError(this.importString);
            this.state = 'loading';
            this.logger.info(`Loading ${this.manifest.name} v${this.manifest.version}`);

            try {
                await this.prepare();
                await this.host.extensions.load(this.importString, this.loadTarget());
            } catch (error) {
                this.state = 'unloaded';
                throw error;
            }

            this.loaded = true;
            this.state = 'loaded';
            this.logger.info(`Loaded ${this.id}`);
        });
    }

    public async unload(): Promise<void> {
        return this.lifecycle.runExclusive(async () => {
            if (!this.loaded) throw new ExtensionNotLoadedError(this.importString);
            this.state = 'unloading';
            try {
                await this.host.extensions.unload(this.importString);
            } finally {
                this.loaded = false;
                this.state = 'unloaded';
            }
            this.logger.info(`Unloaded ${this.id}`);
        });
    }

    /**
     * Re-reads the settings schema, reinstalls dependencies and swaps in fresh
     * code. On failure the module keeps whatever the extension loader restored.
     */
    public async reload(): Promise<void> {
        return this.lifecycle.runExclusive(async () => {
            if (!this.loaded) throw new ExtensionNotLoadedError(this.importString);
            this.loaded = false;
            this.state = 'reloading';

            try {
                await this.prepare();
                await this.host.extensions.reload(this.importString, this.loadTarget());
            } catch (error) {
                this.loaded = this.host.extensions.isLoaded(this.importString);
                this.state = this.loaded ? 'loaded' : 'unloaded';
                throw error;
            }

            this.loaded = true;
            this.state = 'loaded';
            this.logger.info(`Reloaded ${this.id}`);
        });
    }

    /**
     * Merges the module schema into `settings.<id>`, when the module has one.
     */
    public loadSettingsSchema(): void {
        const schemaPath = path.join(this.path, CONFIG.FILES.SETTINGS_SCHEMA);
        if (!fs.existsSync(schemaPath)) return;
        const group = this.settings;
        group.loadSchemaFile(schemaPath);
        group.inSchema = true;
    }

    private async prepare(): Promise<void> {
        this.loadSettingsSchema();
        await this.host.saveSettings();
        await this.host.dependencies.ensure(this.manifest.dependencies, this.logger);
    }

    private loadTarget(): LoadTarget {
        return { request: this.path, root: this.path, host: this.host, module: this };
    }
}
