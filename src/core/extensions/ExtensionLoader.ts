// src/core/extensions/ExtensionLoader.ts

import {
    ExtensionAlreadyLoadedError,
    ExtensionFailedError,
    ExtensionNotFoundError,
    ExtensionNotLoadedError,
    NoEntryPointError,
} from '../errors';
import { Logger, ScopedLogger } from '../logging/Logger';
import type { Module } from '../modules/Module';
import type { Modules } from '../modules/Modules';
import type { ModuleHost } from '../modules/types';
import type { SettingsGroup } from '../settings/SettingsGroup';
import type { ObserveOptions, Observer, Subscription } from '../settings/ObserverRegistry';
import { ExtensionImporter, RequireImporter } from './ExtensionImporter';
import { Handler, HandlerRegistry } from './HandlerRegistry';

export type Teardown = () => unknown;

/**
 * Host access handed to an extension's `setup`. Everything registered through
 * it is undone when the extension is unloaded or its setup fails.
 */
export interface ExtensionContext {
    readonly key: string;
    readonly host: ModuleHost;
    readonly settings: SettingsGroup;
    readonly modules: Modules;
    readonly logger: ScopedLogger;
    registerHandler(name: string, handler: Handler): void;
    observe(pathId: string, callback: Observer, options?: ObserveOptions): Subscription;
    onTeardown(teardown: Teardown): void;
}

/**
 * Anything callable. `length` is the number of declared parameters.
 */
interface EntryPoint {
    readonly length: number;
    call(thisArg: unknown, ...args: unknown[]): unknown;
}

export interface LoadTarget {
    /** Path handed to the importer, usually the module directory */
    request: string;
    /** Directory whose cached code is dropped on unload */
    root: string;
    host: ModuleHost;
    module?: Module;
}

interface LoadedExtension {
    key: string;
    resolved: string;
    exports: unknown;
    setup: EntryPoint;
    target: LoadTarget;
    teardowns: Teardown[];
    subscriptions: Subscription[];
}

function findSetup(exports: unknown): EntryPoint | null {
    if ((typeof exports !== 'object' && typeof exports !== 'function') || exports === null) return null;
    if ('setup' in exports && typeof exports.setup === 'function') return exports.setup;
    if ('default' in exports) return findSetup(exports.default);
    return null;
}

/**
 * Loads, unloads and hot-reloads extensions, keyed by import string.
 */
export class ExtensionLoader {
    private loaded: Map<string, LoadedExtension> = new Map();
    private readonly log = Logger.scope('Extensions');

    constructor(
        public readonly handlers: HandlerRegistry = new HandlerRegistry(),
        private readonly importer: ExtensionImporter = new RequireImporter(),
    ) { }

    public isLoaded(key: string): boolean {
        return this.loaded.has(key);
    }

    public keys(): string[] {
        return [...this.loaded.keys()];
    }

    public async load(key: string, target: LoadTarget): Promise<void> {
        if (this.loaded.has(key)) throw new ExtensionAlreadyLoadedError(key);

        let resolved: string;
        try {
            resolved = this.importer.resolve(target.request);
        } catch (error) {
            throw new ExtensionNotFoundError(key, error);
        }

        let exports: unknown;
        try {
            exports = await this.importer.load(resolved);
        } catch (error) {
            this.importer.evict(target.root);
            throw new ExtensionFailedError(key, error);
        }

        const setup = findSetup(exports);
        if (!setup) {
            this.importer.evict(target.root);
            throw new NoEntryPointError(key);
        }

        await this.runSetup({ key, resolved, exports, setup, target, teardowns: [], subscriptions: [] });
        this.log.debug(`Loaded ${key}`);
    }

    public async unload(key: string): Promise<void> {
        const extension = this.loaded.get(key);
        if (!extension) throw new ExtensionNotLoadedError(key);
        this.loaded.delete(key);

        const errors = await this.dispose(extension);
        this.importer.evict(extension.target.root);
        if (errors.length > 0) throw new ExtensionFailedError(key, errors[0]);
        this.log.debug(`Unloaded ${key}`);
    }

    /**
     * Replaces an extension with a fresh copy of its code. When the fresh copy
     * fails, the previous setup is run again so the extension stays available,
     * and the failure is rethrown.
     */
    public async reload(key: string, target: LoadTarget): Promise<void> {
        const previous = this.loaded.get(key);
        if (!previous) throw new ExtensionNotLoadedError(key);
        this.loaded.delete(key);

        for (const error of await this.dispose(previous)) {
            this.log.warn(`Teardown of ${key} raised during reload`, { error: String(error) });
        }
        this.importer.evict(previous.target.root);

        try {
            await this.load(key, target);
        } catch (error) {
            this.log.error(`Reload of ${key} failed, restoring the previous version`, error);
            try {
                await this.runSetup({ ...previous, teardowns: [], subscriptions: [] });
            } catch (restoreError) {
                this.log.error(`Could not restore ${key}`, restoreError);
            }
            throw error;
        }
    }

    /**
     * Unloads everything, newest first. Failures are logged, not thrown.
     */
    public async unloadAll(): Promise<void> {
        for (const key of [...this.loaded.keys()].reverse()) {
            try {
                await this.unload(key);
            } catch (error) {
                this.log.error(`Failed to unload ${key}`, error);
            }
        }
    }

    private async runSetup(extension: LoadedExtension): Promise<void> {
        const { key, target } = extension;
        const context: ExtensionContext = {
            key,
            host: target.host,
            settings: target.host.settings,
            modules: target.host.modules,
            logger: target.module?.logger ?? Logger.scope(`extensions.${key}`),
            registerHandler: (name, handler) => {
                this.handlers.register(key, name, handler);
            },
            observe: (pathId, callback, options) => {
                const registry = target.host.settings.observerRegistry();
                if (!registry) throw new ExtensionFailedError(key, new Error('settings tree has no observer registry'));
                const subscription = registry.subscribe(pathId, callback, options);
                extension.subscriptions.push(subscription);
                return subscription;
            },
            onTeardown: teardown => {
                extension.teardowns.push(teardown);
            },
        };

        try {
            const wantsModule = extension.setup.length >= 2 && target.module !== undefined;
            await (wantsModule
                ? extension.setup.call(undefined, context, target.module)
                : extension.setup.call(undefined, context));
        } catch (error) {
            for (const teardownError of await this.dispose(extension)) {
                this.log.warn(`Teardown of ${key} raised during rollback`, { error: String(teardownError) });
            }
            this.importer.evict(target.root);
            throw error instanceof ExtensionFailedError ? error : new ExtensionFailedError(key, error);
        }
        this.loaded.set(key, extension);
    }

    /**
     * Runs teardown callbacks newest first, then drops observers and handlers.
     * Returns the errors teardown callbacks raised.
     */
    private async dispose(extension: LoadedExtension): Promise<unknown[]> {
        const errors: unknown[] = [];
        for (const teardown of [...extension.teardowns].reverse()) {
            try {
                await teardown();
            } catch (error) {
                errors.push(error);
            }
        }
        extension.teardowns = [];

        const registry = extension.target.host.settings.observerRegistry();
        for (const subscription of extension.subscriptions) registry?.unsubscribe(subscription);
        extension.subscriptions = [];

        const removed = this.handlers.unregisterOwner(extension.key);
        if (removed > 0) this.log.debug(`Removed ${removed} handler(s) of ${extension.key}`);
        return errors;
    }
}
