// tests/unit/manifest.test.ts

import fs from 'fs';
import path from 'path';
import { ManifestError } from '../../src/core/errors';
import {
    normalizeCoreManifest,
    normalizeProjectManifest,
    parseManifest,
    readManifest,
    validateManifest,
} from '../../src/core/modules/ModuleManifest';
import { Permissions } from '../../src/core/modules/permissions';
import { makeTempDir, removeDir } from '../helpers/fixtures';

function issuesOf(raw: unknown, isCoreModule = false) {
    const result = validateManifest(raw, { isCoreModule });
    return result.ok ? [] : result.issues;
}

describe('Module manifests', () => {
    describe('validateManifest', () => {
        it('should fill in defaults for optional fields', () => {
            const result = validateManifest({ id: 'reminders', name: 'Reminders', version: '1.2.0' }, { isCoreModule: false });
            if (!result.ok) throw new Error('expected a valid manifest');

            expect(result.manifest.description).toBe('No description provided');
            expect(result.manifest.license).toBe('No license specified');
            expect(result.manifest.authors).toEqual([]);
            expect(result.manifest.dependencies).toEqual([]);
            expect(result.manifest.permissions.value).toBe(0);
            expect(result.manifest.isCoreModule).toBe(false);
            expect(Object.isFrozen(result.manifest)).toBe(true);
        });

        it('should report every field problem at once', () => {
            const issues = issuesOf({ id: 'Bad-Id', version: '1.0.0' });
            expect(issues.map(issue => issue.path)).toEqual(['id', 'name']);
        });

        it('should enforce id length', () => {
            expect(issuesOf({ id: 'a'.repeat(32), name: 'Long', version: '1.0.0' })).toEqual([]);
            expect(issuesOf({ id: 'a'.repeat(33), name: 'Long', version: '1.0.0' }).map(issue => issue.path)).toEqual(['id']);
        });

        it('should require a semantic version outside core modules', () => {
            expect(issuesOf({ id: 'mod', name: 'Mod' })).toEqual([{ path: 'version', message: 'is required' }]);
            expect(issuesOf({ id: 'mod', name: 'Mod', version: 'one' })).toEqual([
                { path: 'version', message: "'one' is not a semantic version" },
            ]);
        });

        it('should give core modules the host version', () => {
            const withoutVersion = parseManifest({ id: 'core', name: 'Core' }, { isCoreModule: true });
            const placeholder = parseManifest({ id: 'core', name: 'Core', version: '0.0.0' }, { isCoreModule: true });

            expect(withoutVersion.version).toBe('0.1.0');
            expect(placeholder.version).toBe('0.1.0');
            expect(withoutVersion.isCoreModule).toBe(true);
        });

        it('should parse dependencies and report the bad ones by index', () => {
            const issues = issuesOf({ id: 'mod', name: 'Mod', version: '1.0.0', dependencies: ['left-pad>=1.3', '???'] });
            expect(issues).toEqual([{ path: 'dependencies.1', message: "'???' does not start with a package name" }]);

            const manifest = parseManifest({ id: 'mod', name: 'Mod', version: '1.0.0', dependencies: ['left-pad>=1.3'] }, { isCoreModule: false });
            expect(manifest.dependencies.map(String)).toEqual(['left-pad>=1.3']);
        });

        it('should accept permissions as a list or a table of flags', () => {
            const fromList = parseManifest({ id: 'mod', name: 'Mod', version: '1.0.0', permissions: ['send_messages'] }, { isCoreModule: false });
            const fromTable = parseManifest(
                { id: 'mod', name: 'Mod', version: '1.0.0', permissions: { send_messages: true, embed_links: false } },
                { isCoreModule: false },
            );

            expect(fromList.permissions.toArray()).toEqual(['send_messages']);
            expect(fromTable.permissions.has('send_messages')).toBe(true);
            expect(fromTable.permissions.has('embed_links')).toBe(false);
        });

        it('should reject unknown permissions', () => {
            expect(issuesOf({ id: 'mod', name: 'Mod', version: '1.0.0', permissions: ['fly'] })).toEqual([
                { path: 'permissions', message: "unknown permission 'fly'" },
            ]);
        });
    });

    describe('parseManifest', () => {
        it('should throw a ManifestError carrying the issues', () => {
            let caught: unknown;
            try {
                parseManifest({ id: 'mod', name: 'Mod' }, { isCoreModule: false });
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ManifestError);
            if (!(caught instanceof ManifestError)) return;
            expect(caught.message).toBe('Invalid manifest: version is required');
            expect(caught.issues).toEqual([{ path: 'version', message: 'is required' }]);
            expect(caught.code).toBe('MANIFEST_ERROR');
        });
    });

    describe('file shapes', () => {
        it('should normalize package.json metadata', () => {
            const raw = normalizeProjectManifest({
                name: 'hearth-reminders',
                version: '1.0.0',
                description: 'Reminds people',
                license: 'MIT',
                author: { name: 'Ada', email: 'ada@example.com' },
                contributors: ['Bob'],
                dependencies: { 'left-pad': '^1.3.0' },
                hearth: { id: 'reminders', permissions: ['send_messages'] },
            });
            const manifest = parseManifest(raw, { isCoreModule: false });

            expect(manifest.id).toBe('reminders');
            expect(manifest.name).toBe('hearth-reminders');
            expect(manifest.authors).toEqual(['Ada', 'Bob']);
            expect(manifest.license).toBe('MIT');
            expect(manifest.dependencies.map(String)).toEqual(['left-pad@^1.3.0']);
            expect(manifest.dependencies[0].range).toBe('>=1.3.0 <2.0.0-0');
            expect(manifest.permissions).toEqual(Permissions.fromNames(['send_messages']));
        });

        it('should prefer the name given in the hearth field', () => {
            const raw = normalizeProjectManifest({ name: 'pkg', version: '1.0.0', hearth: { id: 'mod', name: 'Friendly' } });
            expect(parseManifest(raw, { isCoreModule: false }).name).toBe('Friendly');
        });

        it('should refuse package.json without the hearth field', () => {
            expect(() => normalizeProjectManifest({ name: 'pkg' })).toThrow('package.json has no "hearth" object');
        });

        it('should refuse unknown core manifest versions', () => {
            expect(() => normalizeCoreManifest({ manifest_version: 2, module: {} })).toThrow(ManifestError);
            expect(() => normalizeCoreManifest({ manifest_version: 1 })).toThrow('manifest.toml has no [module] table');
        });

        describe('readManifest', () => {
            let dir: string;

            beforeEach(() => {
                dir = makeTempDir();
            });

            afterEach(() => {
                removeDir(dir);
            });

            it('should read a core manifest.toml', () => {
                fs.writeFileSync(path.join(dir, 'manifest.toml'), [
                    'manifest_version = 1',
                    '',
                    '[module]',
                    'id = "core"',
                    'name = "Core"',
                    'description = "Built-in commands"',
                    'authors = ["Hearth maintainers"]',
                    '',
                ].join('\n'));

                const manifest = readManifest(dir, 'core');

                expect(manifest.id).toBe('core');
                expect(manifest.description).toBe('Built-in commands');
                expect(manifest.authors).toEqual(['Hearth maintainers']);
                expect(manifest.version).toBe('0.1.0');
                expect(manifest.isCoreModule).toBe(true);
            });

            it('should fail when the manifest file is missing', () => {
                expect(() => readManifest(dir, 'project')).toThrow(`package.json file not found in ${dir}`);
            });

            it('should fail on malformed JSON', () => {
                fs.writeFileSync(path.join(dir, 'package.json'), '{ nope');
                expect(() => readManifest(dir, 'project')).toThrow(/^package\.json is not valid JSON/);
            });
        });
    });
});
