// src/host/Host.ts

import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { Mutex } from 'async-mutex';
import { CONFIG } from '../config/config';
import { ErrorFactory, ModuleLoadError } from '../core/errors';
import { ExtensionImporter } from '../core/extensions/ExtensionImporter';
import { ExtensionLoader } from '../core/extensions/ExtensionLoader';
import { HandlerRegistry } from '../core/extensions/HandlerRegistry';
import { LogLevel, Logger } from '../core/logging/Logger';
import { Dependencies } from '../core/modules/Dependencies';
import { Module } from '../core/modules/Module';
import { Modules } from '../core/modules/Modules';
import { isBundleFile } from '../core/modules/bundle';
import { HostPaths, ModuleHost } from '../core/modules/types';
import { ObserverRegistry } from '../core/settings/ObserverRegistry';
import { SettingsGroup } from '../core/settings/SettingsGroup';
import { loadSettingsFile, saveSettingsFile } from '../core/settings/settingsFile';
import { NpmInstaller } from '../infrastructure/installer/NpmInstaller';
import { PackageInstaller } from '../infrastructure/installer/types';

export interface HostOptions {
    /** Holds settings.toml, modules/, storage/ and the node_modules of module dependencies */
    dataDir?: string;
    settingsFile?: string;
    /** Extra module directories, scanned before the built-in ones */
    includePaths?: string[];
    coreModulesDir?: string;
    coreSchemaPath?: string;
    installer?: PackageInstaller;
    importer?: ExtensionImporter;
}

export interface LoadReport {
    loaded: string[];
    failed: { id: string; error: unknown }[];
}

export type StartResult =
    | { status: 'started'; report: LoadReport }
    | { status: 'unconfigured'; settingsFile: string };

const log = Logger.scope('Host');

/**
 * Owns the settings tree, the module registry and the extension loader for one process.
 */
export class Host implements ModuleHost {
    public settings: SettingsGroup;
    public readonly modules = new Modules();
    public readonly handlers = new HandlerRegistry();
    public readonly extensions: ExtensionLoader;
    public readonly dependencies: Dependencies;
    public readonly paths: HostPaths;
    public readonly settingsFile: string;
    public ready = false;

    private readonly observers = new ObserverRegistry();
    private readonly saveMutex = new Mutex();
    private readonly dataDir: string;
    private readonly includePaths: string[];
    private readonly coreSchemaPath: string;

    constructor(options: HostOptions = {}) {
        this.dataDir = path.resolve(options.dataDir ?? CONFIG.PATHS.DATA_DIR);
        this.settingsFile = path.resolve(options.settingsFile ?? path.join(this.dataDir, CONFIG.FILES.SETTINGS));
        this.includePaths = (options.includePaths ?? []).map(p => path.resolve(p));
        this.coreSchemaPath = options.coreSchemaPath ?? CONFIG.PATHS.CORE_SCHEMA;
        this.paths = {
            coreModulesDir: path.resolve(options.coreModulesDir ?? CONFIG.PATHS.CORE_MODULES_DIR),
            modulesDir: path.join(this.dataDir, 'modules'),
            storageDir: path.join(this.dataDir, 'storage'),
        };

        // Modules installed under modules/ resolve packages from <data>/node_modules
        this.dependencies = new Dependencies(this.dataDir, options.installer ?? new NpmInstaller(this.dataDir));
        this.extensions = new ExtensionLoader(this.handlers, options.importer);
        this.settings = this.createSettings();
    }

    // -------------------------------------------------------------------------
    // Settings
    // -------------------------------------------------------------------------

    /**
     * A fresh root group holding only the core schema, sharing this host's observers.
     */
    private createSettings(): SettingsGroup {
        const root = new SettingsGroup('settings', { observers: this.observers });
        root.loadSchemaFile(this.coreSchemaPath);
        root.inSchema = true;
        return root;
    }

    /**
     * Rebuilds the tree from the core schema and the persisted file. Observers
     * survive the rebuild. Module schemas are merged by each module's own load,
     * so a broken schema or a stored value that no longer fits it fails only
     * that module; loaded modules get theirs back here.
     */
    public async loadSettings(): Promise<void> {
        const persisted = await loadSettingsFile(this.settingsFile);
        this.settings = this.createSettings();
        this.settings.updateFromDict(persisted, { strict: false });
        for (const module of this.modules) {
            if (!module.loaded) continue;
            try {
                module.loadSettingsSchema();
            } catch (error) {
                log.error(`Could not merge the settings schema of ${module.id}`, error);
            }
        }
        this.applyDebug(this.settings.get('debug').asBoolean());
        log.info(`Loaded settings from ${this.settingsFile}`);
    }

    /**
     * Writes the whole tree. Concurrent module loads each save, so writes are serialized.
     */
    public async saveSettings(): Promise<void> {
        await this.saveMutex.runExclusive(() => saveSettingsFile(this.settingsFile, this.settings));
    }

    private applyDebug(enabled: boolean): void {
        if (enabled) {
            Logger.setLevel(LogLevel.DEBUG);
        } else if (Logger.getLevel() === LogLevel.DEBUG) {
            Logger.setLevel(LogLevel.INFO);
        }
    }

    /**
     * Ids listed in the `modules` setting, duplicates removed. The setting is
     * rewritten when it held duplicates.
     */
    public enabledModuleIds(): string[] {
        const setting = this.settings.get('modules');
        const ids = setting.asStringArray();
        const unique = [...new Set(ids)];
        if (unique.length !== ids.length) {
            log.warn('Removed duplicate entries from the modules setting');
            setting.value = unique;
        }
        return unique;
    }

    // -------------------------------------------------------------------------
    // Startup
    // -------------------------------------------------------------------------

    /**
     * Loads settings, discovers and loads modules. When no settings file exists
     * yet, writes one with the defaults and returns without loading anything.
     */
    public async start(): Promise<StartResult> {
        await fsp.mkdir(this.paths.modulesDir, { recursive: true });
        await fsp.mkdir(this.paths.storageDir, { recursive: true });

        if (!fs.existsSync(this.settingsFile)) {
            await this.saveSettings();
            log.warn(`No settings file found. Defaults were written to ${this.settingsFile}; edit it and start again`);
            return { status: 'unconfigured', settingsFile: this.settingsFile };
        }

        this.observers.subscribe('settings.debug', (_old, enabled) => this.applyDebug(enabled === true));

        await this.discoverModules();
        await this.loadSettings();
        await this.installPendingBundles();

        const report = await this.loadModules(this.enabledModuleIds());
        await this.saveSettings();
        this.ready = true;
        log.info(`Ready with ${report.loaded.length} module(s) loaded, ${report.failed.length} failed`);
        return { status: 'started', report };
    }

    public async discoverModules(): Promise<Module[]> {
        return this.modules.discover(this, [...this.includePaths, this.paths.coreModulesDir, this.paths.modulesDir]);
    }

    /**
     * Installs every bundle dropped into the modules directory and deletes it afterwards.
     */
    public async installPendingBundles(): Promise<Module[]> {
        const installed: Module[] = [];
        const files = (await fsp.readdir(this.paths.modulesDir)).filter(isBundleFile).sort();
        for (const file of files) {
            const bundlePath = path.join(this.paths.modulesDir, file);
            try {
                const module = await this.modules.installBundle(this, bundlePath, {
                    installPath: this.paths.modulesDir,
                    deleteSource: true,
                });
                installed.push(module);
            } catch (error) {
                log.error(`Could not install bundle ${file}`, error);
            }
        }
        return installed;
    }

    /**
     * Loads modules concurrently. A failing module is logged and reported; the
     * others are unaffected.
     */
    public async loadModules(ids: readonly string[]): Promise<LoadReport> {
        const results = await Promise.allSettled(ids.map(async id => {
            if (!this.modules.has(id)) throw ErrorFactory.moduleNotFound(id, { operation: 'loadModules' });
            await this.modules.get(id).load();
            return id;
        }));

        const report: LoadReport = { loaded: [], failed: [] };
        results.forEach((result, index) => {
            const id = ids[index];
            if (result.status === 'fulfilled') {
                report.loaded.push(id);
            } else {
                const reason: unknown = result.reason;
                log.error(`Failed to load module ${id}`, reason);
                report.failed.push({ id, error: reason });
            }
        });
        return report;
    }

    // -------------------------------------------------------------------------
    // Administration
    // -------------------------------------------------------------------------

    /**
     * Loads a module and adds it to the `modules` setting.
     */
    public async enableModule(id: string): Promise<Module> {
        const module = this.modules.get(id);
        try {
            await module.load();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ModuleLoadError(id, `Module ${id} failed to load: ${reason}`, { details: error, operation: 'enableModule' });
        }
        const ids = this.enabledModuleIds();
        if (!ids.includes(id)) this.settings.get('modules').value = [...ids, id];
        await this.saveSettings();
        return module;
    }

    /**
     * Unloads a module and removes it from the `modules` setting.
     */
    public async disableModule(id: string): Promise<Module> {
        const module = this.modules.get(id);
        await module.unload();
        this.settings.get('modules').value = this.enabledModuleIds().filter(enabled => enabled !== id);
        await this.saveSettings();
        return module;
    }

    public async reloadModule(id: string): Promise<Module> {
        const module = this.modules.get(id);
        await module.reload();
        return module;
    }

    public async shutdown(): Promise<void> {
        log.info('Shutting down');
        for (const module of [...this.modules].reverse()) {
            if (!module.loaded) continue;
            try {
                await module.unload();
            } catch (error) {
                log.error(`Failed to unload module ${module.id}`, error);
            }
        }
        await this.extensions.unloadAll();
        if (this.ready) await this.saveSettings();
        this.ready = false;
    }
}
