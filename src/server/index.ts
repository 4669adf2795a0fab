#!/usr/bin/env node
/**
 * Encounter MCP server over stdio
 *
 * Content is loaded and sealed before the transport connects.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import { EncounterManageTool, handleEncounterManage } from './consolidated/encounter-manage.js';
import { sessionFromArgs } from './types.js';
import { EncounterService, setEncounterService } from '../services/encounter.service.js';
import { loadEncounterConfig } from '../utils/config.js';
import { createLogger, logError } from '../utils/logger.js';

const log = createLogger('Server');

function setupShutdownHandlers(): void {
    let isShuttingDown = false;

    const shutdown = (signal: string, code: number = 0) => {
        if (isShuttingDown) return;
        isShuttingDown = true;
        log.info(`Received ${signal}, shutting down`);
        process.exit(code);
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    if (process.platform === 'win32') {
        process.on('SIGBREAK', () => shutdown('SIGBREAK'));
    }

    process.on('uncaughtException', (error) => {
        logError(log, 'Uncaught exception', error);
        shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        logError(log, 'Unhandled rejection', reason);
        shutdown('unhandledRejection', 1);
    });
}

async function main(): Promise<void> {
    setupShutdownHandlers();

    const config = loadEncounterConfig();
    log.info(`Content directory: ${config.contentDir}`);
    setEncounterService(EncounterService.fromConfig(config));

    const server = new McpServer({
        name: 'dungeon-encounter-engine',
        version: '0.1.0'
    });

    server.tool(
        EncounterManageTool.name,
        EncounterManageTool.description,
        EncounterManageTool.inputSchema.extend({ sessionId: z.string().optional() }).shape,
        async (args) => handleEncounterManage(args, sessionFromArgs(args))
    );

    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info('Encounter MCP server running on stdio');
}

main().catch((error) => {
    logError(log, 'Server error', error);
    process.exit(1);
});
