// src/core/errors/errors.ts

import { HearthError } from './HearthError';
import { ErrorContext } from './ErrorContext';

// -------------------------------------------------------------------------
// Configuration errors
// -------------------------------------------------------------------------

export interface ManifestIssue {
    path: string;
    message: string;
}

/**
 * Thrown when a module manifest is missing, unreadable or fails validation.
 * Carries every issue found, not just the first.
 */
export class ManifestError extends HearthError {
    public readonly issues: ManifestIssue[];

    constructor(message: string, issues: ManifestIssue[] = [], context: ErrorContext = {}) {
        super(message, {
            code: 'MANIFEST_ERROR',
            component: 'CORE_MODULES',
            ...context
        });
        this.name = 'ManifestError';
        this.issues = issues;
    }
}

/**
 * Thrown when a settings schema document cannot be parsed or applied.
 */
export class SchemaError extends HearthError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'SCHEMA_ERROR',
            component: 'CORE_SETTINGS',
            ...context
        });
        this.name = 'SchemaError';
    }
}

/**
 * Thrown on a strict write to a key the schema does not declare.
 */
export class UndeclaredSettingError extends HearthError {
    constructor(public readonly pathId: string, context: ErrorContext = {}) {
        super(`${pathId} is not declared in the schema`, {
            code: 'UNDECLARED_SETTING',
            component: 'CORE_SETTINGS',
            suggestion: 'Declare the key in the settings schema or write it non-strictly',
            ...context
        });
        this.name = 'UndeclaredSettingError';
    }
}

/**
 * Thrown when a key would exist both as a setting and as a child group.
 */
export class SettingsConflictError extends HearthError {
    constructor(public readonly pathId: string, context: ErrorContext = {}) {
        super(`${pathId} cannot be both a setting and a settings group`, {
            code: 'SETTINGS_CONFLICT',
            component: 'CORE_SETTINGS',
            ...context
        });
        this.name = 'SettingsConflictError';
    }
}

// -------------------------------------------------------------------------
// Type and lookup errors
// -------------------------------------------------------------------------

/**
 * Thrown when a value does not match the pinned type of a setting.
 */
export class SettingTypeError extends HearthError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'SETTING_TYPE_ERROR',
            component: 'CORE_SETTINGS',
            ...context
        });
        this.name = 'SettingTypeError';
    }
}

export class SettingNotFoundError extends HearthError {
    constructor(public readonly pathId: string, context: ErrorContext = {}) {
        super(`No setting or group at ${pathId}`, {
            code: 'SETTING_NOT_FOUND',
            component: 'CORE_SETTINGS',
            ...context
        });
        this.name = 'SettingNotFoundError';
    }
}

export class ModuleNotFoundError extends HearthError {
    constructor(public readonly moduleId: string, context: ErrorContext = {}) {
        super(`No module with the id '${moduleId}' is registered`, {
            code: 'MODULE_NOT_FOUND',
            component: 'CORE_MODULES',
            ...context
        });
        this.name = 'ModuleNotFoundError';
    }
}

// -------------------------------------------------------------------------
// Lifecycle errors
// -------------------------------------------------------------------------

/**
 * Base class for failures of the extension loading layer. `key` is the import string.
 */
export class ExtensionError extends HearthError {
    constructor(public readonly key: string, message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'EXTENSION_ERROR',
            component: 'CORE_EXTENSIONS',
            ...context
        });
        this.name = 'ExtensionError';
    }
}

export class ExtensionAlreadyLoadedError extends ExtensionError {
    constructor(key: string) {
        super(key, `Extension ${key} is already loaded`, { code: 'EXTENSION_ALREADY_LOADED' });
        this.name = 'ExtensionAlreadyLoadedError';
    }
}

export class ExtensionNotLoadedError extends ExtensionError {
    constructor(key: string) {
        super(key, `Extension ${key} has not been loaded`, { code: 'EXTENSION_NOT_LOADED' });
        this.name = 'ExtensionNotLoadedError';
    }
}

export class ExtensionNotFoundError extends ExtensionError {
    constructor(key: string, details?: unknown) {
        super(key, `Extension ${key} could not be found`, { code: 'EXTENSION_NOT_FOUND', details });
        this.name = 'ExtensionNotFoundError';
    }
}

export class NoEntryPointError extends ExtensionError {
    constructor(key: string) {
        super(key, `Extension ${key} has no setup function`, {
            code: 'NO_ENTRY_POINT',
            suggestion: 'Export an async function named setup from the module entry file',
        });
        this.name = 'NoEntryPointError';
    }
}

/**
 * Wraps an exception raised while importing or setting up an extension.
 */
export class ExtensionFailedError extends ExtensionError {
    constructor(key: string, public readonly original: unknown) {
        const reason = original instanceof Error ? `${original.name}: ${original.message}` : String(original);
        super(key, `Extension ${key} raised an error: ${reason}`, {
            code: 'EXTENSION_FAILED',
            details: original,
        });
        this.name = 'ExtensionFailedError';
    }
}

export interface InstallFailure {
    exitCode: number | null;
    timedOut: boolean;
    output: string;
}

/**
 * Thrown when the package installer exits non-zero or times out.
 */
export class DependencyInstallError extends HearthError {
    public readonly failure: InstallFailure;

    constructor(message: string, failure: InstallFailure, context: ErrorContext = {}) {
        super(message, {
            code: failure.timedOut ? 'INSTALL_TIMEOUT' : 'INSTALL_FAILED',
            component: 'INFRA_INSTALLER',
            retryable: true,
            ...context
        });
        this.name = 'DependencyInstallError';
        this.failure = failure;
    }
}

/**
 * Thrown when a module bundle cannot be built or installed.
 */
export class BundleError extends HearthError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'BUNDLE_ERROR',
            component: 'CORE_MODULES',
            ...context
        });
        this.name = 'BundleError';
    }
}

/**
 * Wraps a per-module lifecycle failure for reporting by the host.
 */
export class ModuleLoadError extends HearthError {
    constructor(public readonly moduleId: string, message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'MODULE_LOAD_FAILED',
            component: 'CORE_MODULES',
            ...context
        });
        this.name = 'ModuleLoadError';
    }
}
