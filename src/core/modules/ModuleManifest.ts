// src/core/modules/ModuleManifest.ts

import fs from 'fs';
import path from 'path';
import semver from 'semver';
import { z } from 'zod';
import { CONFIG } from '../../config/config';
import { ManifestError, ManifestIssue } from '../errors';
import { parseDocument } from '../settings/tomlDocument';
import { PermissionName, Permissions, isPermissionName } from './permissions';
import { Requirement } from './Requirement';

const LIMITS = CONFIG.MANIFEST;
const CORE_DEFAULT_VERSION = '0.0.0';

export type ManifestKind = 'core' | 'project';

export interface ModuleManifest {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly license: string;
    readonly authors: readonly string[];
    readonly dependencies: readonly Requirement[];
    readonly permissions: Permissions;
    readonly isCoreModule: boolean;
}

/**
 * The shape both manifest files are normalized to before validation.
 */
const RawManifestSchema = z.object({
    id: z.string()
        .min(1, 'must not be empty')
        .max(LIMITS.MAX_ID_LENGTH, `must be at most ${LIMITS.MAX_ID_LENGTH} characters`)
        .regex(/^[a-z_][a-z0-9_]*$/, 'must be lowercase letters, digits and underscores, not starting with a digit'),
    name: z.string().trim().min(1, 'must not be empty').max(LIMITS.MAX_NAME_LENGTH),
    description: z.string().trim().min(1).max(LIMITS.MAX_DESCRIPTION_LENGTH).default('No description provided'),
    version: z.string().trim().min(1).optional(),
    license: z.string().trim().min(1).max(LIMITS.MAX_LICENSE_LENGTH).default('No license specified'),
    authors: z.array(z.string().trim().min(1).max(LIMITS.MAX_AUTHOR_LENGTH)).default([]),
    dependencies: z.array(z.string()).default([]),
    permissions: z.union([z.array(z.string()), z.record(z.boolean())]).default([]),
});

export type RawManifest = z.input<typeof RawManifestSchema>;

export type ManifestResult =
    | { ok: true; manifest: ModuleManifest }
    | { ok: false; issues: ManifestIssue[] };

/**
 * Validates a normalized manifest record, collecting every problem found.
 */
export function validateManifest(raw: unknown, options: { isCoreModule: boolean }): ManifestResult {
    const parsed = RawManifestSchema.safeParse(raw);
    if (!parsed.success) {
        return {
            ok: false,
            issues: parsed.error.issues.map(issue => ({
                path: issue.path.join('.') || '(root)',
                message: issue.message,
            })),
        };
    }

    const data = parsed.data;
    const issues: ManifestIssue[] = [];

    let version = data.version;
    if (version === undefined || (options.isCoreModule && version === CORE_DEFAULT_VERSION)) {
        if (options.isCoreModule) {
            version = CONFIG.HOST.VERSION;
        } else {
            issues.push({ path: 'version', message: 'is required' });
        }
    } else if (semver.valid(version) === null) {
        issues.push({ path: 'version', message: `'${version}' is not a semantic version` });
    }

    const dependencies: Requirement[] = [];
    data.dependencies.forEach((spec, index) => {
        try {
            dependencies.push(Requirement.parse(spec));
        } catch (error) {
            issues.push({ path: `dependencies.${index}`, message: error instanceof Error ? error.message : String(error) });
        }
    });

    const requested = Array.isArray(data.permissions)
        ? data.permissions
        : Object.entries(data.permissions).filter(([, granted]) => granted).map(([name]) => name);
    const permissionNames: PermissionName[] = [];
    for (const name of requested) {
        if (isPermissionName(name)) {
            permissionNames.push(name);
        } else {
            issues.push({ path: 'permissions', message: `unknown permission '${name}'` });
        }
    }

    if (issues.length > 0 || version === undefined) return { ok: false, issues };

    const manifest: ModuleManifest = Object.freeze({
        id: data.id,
        name: data.name,
        description: data.description,
        version,
        license: data.license,
        authors: Object.freeze([...data.authors]),
        dependencies: Object.freeze(dependencies),
        permissions: Permissions.fromNames(permissionNames),
        isCoreModule: options.isCoreModule,
    });
    return { ok: true, manifest };
}

/**
 * @throws {ManifestError} listing every issue when the record is invalid
 */
export function parseManifest(raw: unknown, options: { isCoreModule: boolean }, source = 'manifest'): ModuleManifest {
    const result = validateManifest(raw, options);
    if (result.ok) return result.manifest;
    const summary = result.issues.map(issue => `${issue.path} ${issue.message}`).join('; ');
    throw new ManifestError(`Invalid ${source}: ${summary}`, result.issues, { operation: 'parseManifest' });
}

// -------------------------------------------------------------------------
// File shapes
// -------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `manifest.toml`: `manifest_version = 1` plus a `[module]` table holding the record.
 */
export function normalizeCoreManifest(document: Record<string, unknown>): unknown {
    if (document.manifest_version !== 1) {
        throw new ManifestError('Unsupported manifest_version, expected 1', [
            { path: 'manifest_version', message: `got ${JSON.stringify(document.manifest_version)}` },
        ]);
    }
    if (!isRecord(document.module)) {
        throw new ManifestError('manifest.toml has no [module] table', [{ path: 'module', message: 'is required' }]);
    }
    return document.module;
}

function personName(person: unknown): unknown {
    if (isRecord(person) && typeof person.name === 'string') return person.name;
    return person;
}

/**
 * `package.json`: npm metadata plus the module-specific `hearth` object.
 */
export function normalizeProjectManifest(pkg: Record<string, unknown>): unknown {
    const field = pkg[LIMITS.MANIFEST_FIELD];
    if (!isRecord(field)) {
        throw new ManifestError(`package.json has no "${LIMITS.MANIFEST_FIELD}" object`, [
            { path: LIMITS.MANIFEST_FIELD, message: 'is required' },
        ]);
    }

    const authors: unknown[] = [];
    if (pkg.author !== undefined) authors.push(personName(pkg.author));
    if (Array.isArray(pkg.contributors)) authors.push(...pkg.contributors.map(personName));

    const dependencies = isRecord(pkg.dependencies)
        ? Object.entries(pkg.dependencies).map(([name, range]) => `${name}@${String(range)}`)
        : pkg.dependencies;

    return {
        id: field.id,
        name: field.name ?? pkg.name,
        description: pkg.description,
        version: pkg.version,
        license: pkg.license,
        authors,
        dependencies,
        permissions: field.permissions,
    };
}

export function manifestFileFor(kind: ManifestKind): string {
    return kind === 'core' ? CONFIG.FILES.CORE_MANIFEST : CONFIG.FILES.PROJECT_MANIFEST;
}

/**
 * Parses manifest file text of either shape into a raw record.
 */
export function parseManifestSource(kind: ManifestKind, source: string): unknown {
    if (kind === 'core') {
        let document: Record<string, unknown>;
        try {
            document = parseDocument(source);
        } catch (error) {
            throw new ManifestError(`manifest.toml is not valid TOML: ${error instanceof Error ? error.message : String(error)}`);
        }
        return normalizeCoreManifest(document);
    }

    let pkg: unknown;
    try {
        pkg = JSON.parse(source);
    } catch (error) {
        throw new ManifestError(`package.json is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRecord(pkg)) throw new ManifestError('package.json must hold an object');
    return normalizeProjectManifest(pkg);
}

/**
 * Reads and validates the manifest of a module directory.
 */
export function readManifest(moduleDir: string, kind: ManifestKind): ModuleManifest {
    const file = path.join(moduleDir, manifestFileFor(kind));
    let source: string;
    try {
        source = fs.readFileSync(file, 'utf-8');
    } catch (error) {
        throw new ManifestError(`${manifestFileFor(kind)} file not found in ${moduleDir}`, [], { details: error });
    }
    return parseManifest(parseManifestSource(kind, source), { isCoreModule: kind === 'core' }, file);
}

/**
 * Whether a directory carries a manifest of the given shape, without validating it.
 */
export function hasManifest(dir: string, kind: ManifestKind): boolean {
    const file = path.join(dir, manifestFileFor(kind));
    if (!fs.existsSync(file)) return false;
    if (kind === 'core') return true;
    try {
        const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        return isRecord(pkg) && pkg[LIMITS.MANIFEST_FIELD] !== undefined;
    } catch {
        // An unreadable package.json is not a module candidate
        return false;
    }
}
