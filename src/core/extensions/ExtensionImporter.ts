// src/core/extensions/ExtensionImporter.ts

import path from 'path';

/**
 * How extension code is located and evaluated. Swapped for an in-memory
 * importer in tests.
 */
export interface ExtensionImporter {
    /** Absolute entry file for a request; throws when nothing is there */
    resolve(request: string): string;
    load(resolved: string): Promise<unknown>;
    /** Forget cached code below a directory so the next load re-evaluates it */
    evict(root: string): void;
}

/**
 * Loads extensions with CommonJS `require`. A module directory resolves to
 * the `main` of its package.json, or to index.js.
 */
export class RequireImporter implements ExtensionImporter {
    public resolve(request: string): string {
        return require.resolve(path.resolve(request));
    }

    public async load(resolved: string): Promise<unknown> {
        return require(resolved);
    }

    public evict(root: string): void {
        const prefix = path.resolve(root) + path.sep;
        for (const key of Object.keys(require.cache)) {
            if (key.startsWith(prefix)) delete require.cache[key];
        }
    }
}
