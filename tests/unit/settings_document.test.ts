// tests/unit/settings_document.test.ts

import fs from 'fs';
import path from 'path';
import { SettingsGroup } from '../../src/core/settings/SettingsGroup';
import { loadSettingsFile, parseSettingLiteral, saveSettingsFile } from '../../src/core/settings/settingsFile';
import { formatValue, parseValueLiteral } from '../../src/core/settings/tomlDocument';
import { makeTempDir, removeDir } from '../helpers/fixtures';

const SCHEMA = [
    '# Enable debug logging',
    'debug = false',
    '',
    '# Prefixes',
    '# for commands',
    'command_prefixes = ["!", "?"]',
    'ratio = 0.5',
    'limits = { max = 3 }',
    '',
    '# Reminder settings',
    '[reminders]',
    '# Minutes between checks',
    'interval = 5',
    '',
].join('\n');

const DOCUMENT = [
    '# Enable debug logging',
    'debug = false',
    '',
    '# Prefixes',
    '# for commands',
    'command_prefixes = ["!", "?"]',
    '',
    'ratio = 0.5',
    '',
    'limits = { max = 3 }',
    '',
    '# Reminder settings',
    '[reminders]',
    '# Minutes between checks',
    'interval = 5',
    '',
].join('\n');

describe('Settings documents', () => {
    describe('asDocument', () => {
        it('should write descriptions, blank lines and table headers', () => {
            const group = new SettingsGroup('settings');
            group.loadSchema(SCHEMA);
            expect(group.asDocument()).toBe(DOCUMENT);
        });

        it('should reproduce the same document after a round trip', () => {
            const first = new SettingsGroup('settings');
            first.loadSchema(SCHEMA);
            const second = new SettingsGroup('settings');
            second.loadSchema(first.asDocument());

            expect(second.asDocument()).toBe(first.asDocument());
            expect(second.toObject()).toEqual(first.toObject());
            expect(second.getChild('reminders').description).toBe('Reminder settings');
            expect(second.get('command_prefixes').description).toBe('Prefixes\nfor commands');
        });

        it('should write the new value of a described setting', () => {
            const group = new SettingsGroup('settings');
            group.loadSchema('# Enable debug logging\ndebug = false\n');
            group.set('debug', true);
            expect(group.asDocument()).toBe('# Enable debug logging\ndebug = true\n');
        });

        it('should flag undeclared settings and groups', () => {
            const group = new SettingsGroup('settings');
            group.loadSchema('debug = false\n');
            group.set('stray', 'x', { strict: false });
            group.getChild('ghost', true).set('a', 1, { strict: false });

            expect(group.asDocument()).toBe([
                'debug = false',
                '',
                'stray = "x"  # ⚠️ Unrecognised setting',
                '',
                '[ghost]  # 🚫 Disabled',
                'a = 1',
                '',
            ].join('\n'));
        });

        it('should leave undeclared settings unmarked when warnings are off', () => {
            const group = new SettingsGroup('settings');
            group.set('stray', 'x', { strict: false });
            expect(group.asDocument({ warnSchema: false })).toBe('stray = "x"\n');
        });

        it('should keep floats distinct from integers', () => {
            const group = new SettingsGroup('settings');
            group.loadSchema('whole = 1.0\ncount = 1\n');
            expect(group.get('whole').type).toBe('float');
            expect(group.get('count').type).toBe('integer');
            expect(group.asDocument()).toBe('whole = 1.0\n\ncount = 1\n');
        });

        it('should keep number kinds inside inline tables whatever the key order', () => {
            const group = new SettingsGroup('settings');
            group.loadSchema('t = { b = 1.5, 1 = 2 }\n');
            expect(group.get('t').typed).toEqual({
                type: 'table',
                value: { b: { type: 'float', value: 1.5 }, 1: { type: 'integer', value: 2 } },
            });
            expect(group.asDocument()).toBe('t = { 1 = 2, b = 1.5 }\n');
        });

        it('should attach comments after the last entry of a table to what follows it', () => {
            const group = new SettingsGroup('settings');
            group.loadSchema('[first]\na = 1\n# Second table\n[second]\nb = 2\n');
            expect(group.getChild('second').description).toBe('Second table');
            expect(group.resolve('first.a').description).toBe('');
        });
    });

    describe('value literals', () => {
        it('should parse single TOML values', () => {
            expect(parseValueLiteral('true')).toEqual({ type: 'boolean', value: true });
            expect(parseValueLiteral('2.0')).toEqual({ type: 'float', value: 2 });
            expect(parseValueLiteral('"text"')).toEqual({ type: 'string', value: 'text' });
            expect(parseSettingLiteral('["!", "?"]')).toEqual(['!', '?']);
        });

        it('should pair number kinds with nested keys and indexes', () => {
            expect(formatValue(parseValueLiteral('[[1, 2.0], { x = 3 }]'))).toBe('[[1, 2.0], { x = 3 }]');
            expect(formatValue(parseValueLiteral('{ a.b = 1.0, c = 2 }'))).toBe('{ a = { b = 1.0 }, c = 2 }');
            expect(formatValue(parseValueLiteral('[ # first\n  4,\n  5.0,\n]'))).toBe('[4, 5.0]');
        });

        it('should report invalid TOML once', () => {
            let message = '';
            try {
                parseValueLiteral('= 1');
            } catch (error) {
                message = error instanceof Error ? error.message : String(error);
            }
            expect(message.startsWith('Invalid TOML document:')).toBe(true);
            expect(message.indexOf('Invalid TOML document:', 1)).toBe(-1);
        });

        it('should reject text that is not one value', () => {
            expect(() => parseValueLiteral('1\nother = 2')).toThrow("'1\nother = 2' is not a single value");
        });
    });

    describe('settings files', () => {
        let dir: string;

        beforeEach(() => {
            dir = makeTempDir();
        });

        afterEach(() => {
            removeDir(dir);
        });

        it('should save a tree and read the values back', async () => {
            const group = new SettingsGroup('settings');
            group.loadSchema(SCHEMA);
            group.set('debug', true);
            const file = path.join(dir, 'nested', 'settings.toml');

            await saveSettingsFile(file, group);

            expect(fs.readFileSync(file, 'utf-8')).toBe(DOCUMENT.replace('debug = false', 'debug = true'));
            expect(await loadSettingsFile(file)).toEqual({
                debug: true,
                command_prefixes: ['!', '?'],
                ratio: 0.5,
                limits: { max: 3 },
                reminders: { interval: 5 },
            });
        });

        it('should name the file when it cannot be parsed', async () => {
            const file = path.join(dir, 'settings.toml');
            fs.writeFileSync(file, 'debug = \n');
            await expect(loadSettingsFile(file)).rejects.toThrow(`${file}: Invalid TOML document`);
        });
    });
});
