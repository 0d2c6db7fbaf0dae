// tests/integration/host_startup.test.ts

import fs from 'fs';
import path from 'path';
import { CONFIG } from '../../src/config/config';
import { ModuleNotFoundError, SchemaError } from '../../src/core/errors';
import { ExtensionContext } from '../../src/core/extensions/ExtensionLoader';
import { LogLevel, Logger } from '../../src/core/logging/Logger';
import { Host } from '../../src/host/Host';
import { FakeInstaller, MemoryImporter, makeTempDir, removeDir, writeProjectModule } from '../helpers/fixtures';

describe('Host startup', () => {
    let dir: string;
    let importer: MemoryImporter;
    let host: Host;
    let teardown: jest.Mock;
    const initialLevel = Logger.getLevel();

    beforeEach(() => {
        dir = makeTempDir();
        importer = new MemoryImporter();
        teardown = jest.fn();
        host = new Host({
            dataDir: dir,
            coreModulesDir: path.join(dir, 'core'),
            installer: new FakeInstaller(),
            importer,
        });

        const greeterDir = writeProjectModule(host.paths.modulesDir, 'greeter', { schema: 'greeting = "hello"\n' });
        importer.set(greeterDir, {
            setup: (context: ExtensionContext) => {
                context.registerHandler('greet', () => context.settings.resolve('greeter.greeting').value);
                context.onTeardown(teardown);
            },
        });
        const brokenDir = writeProjectModule(host.paths.modulesDir, 'broken');
        importer.set(brokenDir, {
            setup: () => {
                throw new Error('cannot start');
            },
        });
    });

    afterEach(() => {
        Logger.setLevel(initialLevel);
        removeDir(dir);
    });

    function writeSettings(lines: string[]): void {
        fs.writeFileSync(host.settingsFile, lines.join('\n') + '\n');
    }

    it('should write the defaults and stop when there is no settings file', async () => {
        const result = await host.start();

        expect(result).toEqual({ status: 'unconfigured', settingsFile: path.join(dir, 'settings.toml') });
        expect(fs.readFileSync(host.settingsFile, 'utf-8')).toBe(fs.readFileSync(CONFIG.PATHS.CORE_SCHEMA, 'utf-8'));
        expect(host.ready).toBe(false);
        expect(host.modules.size).toBe(0);
    });

    it('should load enabled modules and isolate the ones that fail', async () => {
        writeSettings(['modules = ["greeter", "broken", "missing"]']);

        const result = await host.start();

        if (result.status !== 'started') throw new Error('expected the host to start');
        expect(result.report.loaded).toEqual(['greeter']);
        expect(result.report.failed.map(failure => failure.id)).toEqual(['broken', 'missing']);
        expect(result.report.failed[1].error).toBeInstanceOf(ModuleNotFoundError);
        expect(host.modules.get('greeter').state).toBe('loaded');
        expect(host.modules.get('broken').state).toBe('unloaded');
        expect(await host.handlers.invoke('greet')).toBe('hello');
        expect(host.ready).toBe(true);
    });

    it('should fail only the module whose settings schema is broken', async () => {
        writeProjectModule(host.paths.modulesDir, 'zbroken', { schema: 'x = = 1\n' });
        writeSettings(['modules = ["greeter", "zbroken"]']);

        const result = await host.start();

        if (result.status !== 'started') throw new Error('expected the host to start');
        expect(result.report.loaded).toEqual(['greeter']);
        expect(result.report.failed.map(failure => failure.id)).toEqual(['zbroken']);
        expect(result.report.failed[0].error).toBeInstanceOf(SchemaError);
        expect(await host.handlers.invoke('greet')).toBe('hello');
    });

    it('should ignore broken schemas of modules that are not enabled', async () => {
        writeProjectModule(host.paths.modulesDir, 'zbroken', { schema: 'x = = 1\n' });
        writeSettings(['modules = ["greeter"]']);

        const result = await host.start();

        expect(result).toEqual({ status: 'started', report: { loaded: ['greeter'], failed: [] } });
    });

    it('should fail only the module whose stored values no longer fit its schema', async () => {
        writeProjectModule(host.paths.modulesDir, 'other', { schema: 'level = 1\n' });
        writeSettings(['modules = ["greeter", "other"]', '', '[other]', 'level = "high"']);

        const result = await host.start();

        if (result.status !== 'started') throw new Error('expected the host to start');
        expect(result.report.loaded).toEqual(['greeter']);
        expect(result.report.failed.map(failure => failure.id)).toEqual(['other']);
        const error = result.report.failed[0].error;
        expect(error).toBeInstanceOf(SchemaError);
        expect(error instanceof Error ? error.message : '').toContain('settings.other.level: stored value does not fit the schema');
        expect(host.settings.resolve('other.level').value).toBe('high');
    });

    it('should keep the saved settings of disabled modules and mark them', async () => {
        writeProjectModule(host.paths.modulesDir, 'idle', { schema: 'mode = "off"\n' });
        writeSettings(['modules = ["greeter"]', '', '[idle]', 'mode = "on"']);

        await host.start();

        expect(host.settings.getChild('idle').inSchema).toBe(false);
        const lines = fs.readFileSync(host.settingsFile, 'utf-8').split('\n');
        expect(lines).toContain('[idle]  # 🚫 Disabled');
        expect(lines).toContain('mode = "on"');
    });

    it('should apply persisted values over module schemas', async () => {
        writeSettings(['modules = ["greeter"]', '', '[greeter]', 'greeting = "howdy"']);

        await host.start();

        expect(await host.handlers.invoke('greet')).toBe('howdy');
        const saved = fs.readFileSync(host.settingsFile, 'utf-8');
        expect(saved.split('\n')).toContain('greeting = "howdy"');
        expect(saved.split('\n')).toContain('[greeter]');
    });

    it('should drop duplicate module ids from the modules setting', async () => {
        writeSettings(['modules = ["greeter", "greeter"]']);

        await host.start();

        expect(host.settings.get('modules').value).toEqual(['greeter']);
        expect(fs.readFileSync(host.settingsFile, 'utf-8').split('\n')).toContain('modules = ["greeter"]');
    });

    it('should keep and flag settings the schema does not know', async () => {
        writeSettings(['mystery = 1']);

        await host.start();

        expect(host.settings.get('mystery').inSchema).toBe(false);
        expect(fs.readFileSync(host.settingsFile, 'utf-8').split('\n')).toContain('mystery = 1  # ⚠️ Unrecognised setting');
    });

    it('should follow the debug setting for the log level', async () => {
        writeSettings(['debug = true']);

        await host.start();
        expect(Logger.getLevel()).toBe(LogLevel.DEBUG);

        host.settings.set('debug', false);
        expect(Logger.getLevel()).toBe(LogLevel.INFO);
    });

    it('should unload modules and save settings on shutdown', async () => {
        writeSettings(['modules = ["greeter"]']);
        await host.start();
        host.settings.set('command_prefixes', ['?']);

        await host.shutdown();

        expect(teardown).toHaveBeenCalledTimes(1);
        expect(host.modules.get('greeter').loaded).toBe(false);
        expect(host.ready).toBe(false);
        expect(fs.readFileSync(host.settingsFile, 'utf-8').split('\n')).toContain('command_prefixes = ["?"]');
    });
});
