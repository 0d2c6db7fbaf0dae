// src/core/modules/bundle.ts

import fs from 'fs/promises';
import path from 'path';
import AdmZip from 'adm-zip';
import { CONFIG } from '../../config/config';
import { BundleError, ManifestError } from '../errors';
import { Logger } from '../logging/Logger';
import { ManifestKind, ModuleManifest, manifestFileFor, parseManifest, parseManifestSource, readManifest } from './ModuleManifest';

const SKIPPED_DIRS = new Set(['dist', 'node_modules', '.git']);

export function isBundleFile(file: string): boolean {
    return path.extname(file) === CONFIG.FILES.BUNDLE_EXTENSION;
}

/**
 * Opens a bundle and validates the manifest at its root without extracting anything.
 * The manifest is validated as a non-core module's.
 */
export function readBundle(bundlePath: string): { zip: AdmZip; manifest: ModuleManifest; kind: ManifestKind } {
    let zip: AdmZip;
    try {
        zip = new AdmZip(bundlePath);
    } catch (error) {
        throw new BundleError(`${bundlePath} is not a readable bundle`, { details: error, operation: 'readBundle' });
    }

    const kinds: ManifestKind[] = ['project', 'core'];
    for (const kind of kinds) {
        const entry = zip.getEntry(manifestFileFor(kind));
        if (!entry) continue;
        const source = entry.getData().toString('utf-8');
        try {
            const manifest = parseManifest(parseManifestSource(kind, source), { isCoreModule: false }, `${bundlePath} manifest`);
            return { zip, manifest, kind };
        } catch (error) {
            if (error instanceof ManifestError) {
                throw new BundleError(error.message, { details: error.issues, operation: 'readBundle' });
            }
            throw error;
        }
    }
    throw new BundleError(`${bundlePath} has no ${CONFIG.FILES.PROJECT_MANIFEST} or ${CONFIG.FILES.CORE_MANIFEST} at its root`, {
        operation: 'readBundle',
    });
}

export async function extractBundle(zip: AdmZip, target: string): Promise<void> {
    await fs.mkdir(target, { recursive: true });
    await new Promise<void>((resolve, reject) => {
        zip.extractAllToAsync(target, false, false, error => (error ? reject(error) : resolve()));
    });
}

async function addDirectory(zip: AdmZip, root: string, relative: string): Promise<void> {
    const dir = path.join(root, relative);
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
        const entryPath = path.join(relative, entry.name);
        if (entry.isDirectory()) {
            if (SKIPPED_DIRS.has(entry.name)) continue;
            await addDirectory(zip, root, entryPath);
        } else if (entry.isFile()) {
            zip.addFile(entryPath.split(path.sep).join('/'), await fs.readFile(path.join(root, entryPath)));
        }
    }
}

export interface BuildOptions {
    /** Defaults to `<modulePath>/dist` */
    outDir?: string;
    kind?: ManifestKind;
}

/**
 * Zips a module directory to `<outDir>/<id>-<version>.ember`. Returns the archive path.
 */
export async function buildBundle(modulePath: string, options: BuildOptions = {}): Promise<string> {
    const root = path.resolve(modulePath);
    const kind = options.kind ?? 'project';
    const manifest = readManifest(root, kind);

    const zip = new AdmZip();
    await addDirectory(zip, root, '');

    const outDir = options.outDir ?? path.join(root, 'dist');
    await fs.mkdir(outDir, { recursive: true });
    const outPath = path.join(outDir, `${manifest.id}-${manifest.version}${CONFIG.FILES.BUNDLE_EXTENSION}`);
    await fs.writeFile(outPath, zip.toBuffer());
    Logger.info('Bundles', `Built ${outPath}`);
    return outPath;
}
