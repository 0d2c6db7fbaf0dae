// src/interface/mcp/tools.ts

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { CONFIG } from '../../config/config';
import { Logger } from '../../core/logging/Logger';
import type { Host } from '../../host/Host';
import { callAdminTool, toolDefinitions } from './adminTools';

/**
 * MCP server exposing module and settings administration for a running host.
 */
export function createAdminServer(host: Host): Server {
    const server = new Server(
        {
            name: `${CONFIG.HOST.NAME}-admin`,
            version: CONFIG.HOST.VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return {
            tools: toolDefinitions.map(tool => ({
                name: tool.name,
                description: tool.description,
                inputSchema: tool.inputSchema,
            })),
        };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return callAdminTool(host, name, args ?? {});
    });

    server.onerror = (error: Error) => {
        Logger.error('MCP', '[MCP Server Error]', error);
    };

    return server;
}

/**
 * Serves the admin tools on stdio until the process receives SIGINT or SIGTERM.
 */
export async function serveAdmin(host: Host): Promise<void> {
    const server = createAdminServer(host);

    const cleanup = async () => {
        Logger.info('MCP', 'Shutting down gracefully...');
        await server.close();
        await host.shutdown();
        process.exit(0);
    };
    const onSignal = () => {
        cleanup().catch(error => {
            Logger.error('MCP', 'Shutdown failed', error);
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    const transport = new StdioServerTransport();
    await server.connect(transport);
    Logger.info('MCP', 'Admin server running on stdio');
}
