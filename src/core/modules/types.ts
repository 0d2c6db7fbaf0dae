// src/core/modules/types.ts

import type { SettingsGroup } from '../settings/SettingsGroup';
import type { ExtensionLoader } from '../extensions/ExtensionLoader';
import type { Dependencies } from './Dependencies';
import type { Modules } from './Modules';

export type ModuleState = 'unloaded' | 'loading' | 'loaded' | 'unloading' | 'reloading';

export interface HostPaths {
    /** Built-in modules; their manifests are manifest.toml */
    coreModulesDir: string;
    /** Installed third-party modules */
    modulesDir: string;
    /** Per-module private storage, one directory per id */
    storageDir: string;
}

/**
 * What a Module needs from the process hosting it.
 */
export interface ModuleHost {
    readonly settings: SettingsGroup;
    readonly modules: Modules;
    readonly extensions: ExtensionLoader;
    readonly dependencies: Dependencies;
    readonly paths: HostPaths;
    saveSettings(): Promise<void>;
}
