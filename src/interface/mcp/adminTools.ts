// src/interface/mcp/adminTools.ts

import { z } from 'zod';
import { HearthError, UndeclaredSettingError } from '../../core/errors';
import { formatValue, parseValueLiteral } from '../../core/settings/tomlDocument';
import type { Host } from '../../host/Host';

// -------------------------------------------------------------------------
// Validation Schemas
// -------------------------------------------------------------------------
const ModuleIdSchema = z.object({
    id: z.string().min(1).max(32),
});

const GetSettingSchema = z.object({
    path: z.string().min(1).max(256),
});

const SetSettingSchema = z.object({
    path: z.string().min(1).max(256),
    value: z.string().min(1).max(10000),
});

// A type alias, so the SDK's indexed result types accept it
export type ToolResult = {
    content: { type: 'text'; text: string }[];
};

function text(value: string): ToolResult {
    return { content: [{ type: 'text', text: value }] };
}

const moduleIdInput = {
    type: 'object',
    properties: {
        id: { type: 'string', description: 'Module id, e.g. reminders' },
    },
    required: ['id'],
};

export const toolDefinitions = [
    {
        name: 'list_modules',
        description: 'List discovered modules with their version and lifecycle state',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'enable_module',
        description: 'Load a module and add it to the modules setting',
        inputSchema: moduleIdInput,
    },
    {
        name: 'disable_module',
        description: 'Unload a module and remove it from the modules setting',
        inputSchema: moduleIdInput,
    },
    {
        name: 'reload_module',
        description: 'Reload a module from disk, keeping the old version if the new one fails',
        inputSchema: moduleIdInput,
    },
    {
        name: 'get_setting',
        description: 'Read a setting by dotted path, e.g. debug or reminders.interval',
        inputSchema: {
            type: 'object',
            properties: {
                path: { type: 'string', description: 'Dotted path below the settings root' },
            },
            required: ['path'],
        },
    },
    {
        name: 'set_setting',
        description: 'Write a declared setting. The value is a TOML literal such as true, 5, "text" or ["a", "b"]',
        inputSchema: {
            type: 'object',
            properties: {
                path: { type: 'string', description: 'Dotted path below the settings root' },
                value: { type: 'string', description: 'TOML value literal' },
            },
            required: ['path', 'value'],
        },
    },
    {
        name: 'save_settings',
        description: 'Write the settings tree to the settings file',
        inputSchema: { type: 'object', properties: {} },
    },
];

/**
 * Runs one admin tool against a host. Errors are rethrown as plain Errors
 * carrying a readable message.
 */
export async function callAdminTool(host: Host, name: string, args: unknown): Promise<ToolResult> {
    try {
        switch (name) {
            case 'list_modules': {
                const lines = [...host.modules].map(module => {
                    const core = module.manifest.isCoreModule ? ' (core)' : '';
                    return `${module.id} v${module.manifest.version} [${module.state}]${core}`;
                });
                return text(lines.join('\n') || 'No modules discovered.');
            }
            case 'enable_module': {
                const { id } = ModuleIdSchema.parse(args);
                await host.enableModule(id);
                return text(`Enabled ${id}`);
            }
            case 'disable_module': {
                const { id } = ModuleIdSchema.parse(args);
                await host.disableModule(id);
                return text(`Disabled ${id}`);
            }
            case 'reload_module': {
                const { id } = ModuleIdSchema.parse(args);
                await host.reloadModule(id);
                return text(`Reloaded ${id}`);
            }
            case 'get_setting': {
                const { path } = GetSettingSchema.parse(args);
                const setting = host.settings.resolve(path);
                return text(`${setting.pathId()} = ${formatValue(setting.typed)}`);
            }
            case 'set_setting': {
                const { path, value } = SetSettingSchema.parse(args);
                const setting = host.settings.resolve(path);
                if (!setting.inSchema) throw new UndeclaredSettingError(setting.pathId());
                setting.assign(parseValueLiteral(value));
                await host.saveSettings();
                return text(`${setting.pathId()} = ${formatValue(setting.typed)}`);
            }
            case 'save_settings': {
                await host.saveSettings();
                return text(`Saved settings to ${host.settingsFile}`);
            }
            default:
                throw new HearthError(`Unknown tool: ${name}`, { code: 'UNKNOWN_TOOL', component: 'INTERFACE_MCP' });
        }
    } catch (err: unknown) {
        if (err instanceof z.ZodError) {
            const issues = err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
            throw new Error(`Validation Error: ${issues}`);
        }
        const message = err instanceof HearthError ? err.toUserFriendly() :
            (err instanceof Error ? err.message : String(err));
        throw new Error(`Error executing tool ${name}: ${message}`);
    }
}
