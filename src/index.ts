#!/usr/bin/env node
/**
 * Repository knowledge base
 *
 * Library entry point. Run directly, it starts the MCP server configured from
 * the environment (stdio unless KB_TRANSPORT=http).
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { McpToolsServer } from './server/index.js';
import { loadConfig, type KnowledgeBaseConfig } from './config/index.js';
import { Logger } from './utils/logger.js';

export { McpToolsServer, type McpServerOptions } from './server/index.js';
export { DatabaseManager, type DatabaseConfig } from './database/index.js';
export { FileKnowledgeRepository } from './repositories/FileKnowledgeRepository.js';
export { RepositoryError } from './repositories/BaseRepository.js';
export { KnowledgeBaseService } from './services/KnowledgeBaseService.js';
export { KnowledgeSearchService, scoreRecord, tokenizeQuery } from './services/KnowledgeSearchService.js';
export { DependencyGraph, DependencyGraphService } from './services/DependencyGraphService.js';
export { CategoryIndexService } from './services/CategoryIndexService.js';
export { KnowledgeBaseMcpTools } from './tools/KnowledgeBaseTools.js';
export { loadConfig, ConfigError, type KnowledgeBaseConfig } from './config/index.js';
export * from './utils/errors.js';
export * from './schemas/index.js';

export const SERVER_NAME = 'repo-knowledge-base';
export const SERVER_VERSION = '0.1.0';

/**
 * Starts the MCP server and stops it cleanly on SIGINT/SIGTERM.
 */
export async function startServer(config: KnowledgeBaseConfig): Promise<McpToolsServer> {
  Logger.configure(config.logging);
  const logger = new Logger('main');

  logger.info('Starting knowledge base server', {
    databasePath: config.databasePath,
    transport: config.transport,
    ...(config.transport === 'http' ? { host: config.http.host, port: config.http.port } : {}),
  });

  const server = new McpToolsServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    databasePath: config.databasePath,
    transport: config.transport,
    httpHost: config.http.host,
    httpPort: config.http.port,
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', { error });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
  return server;
}

export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return pathToFileURL(realpathSync(entry)).href === moduleUrl;
  } catch {
    return false;
  }
}

if (isMainModule(import.meta.url)) {
  startServer(loadConfig()).catch((error: unknown) => {
    process.stderr.write(`Failed to start MCP server: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
}
