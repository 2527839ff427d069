#!/usr/bin/env node
import { Command, Option } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { McpToolsServer } from "../server/McpServer.js";
import { loadConfig, TRANSPORTS, type KnowledgeBaseConfig } from "../config/index.js";
import { FILE_TYPES, TECHNOLOGIES } from "../schemas/index.js";
import { LOG_LEVELS, Logger } from "../utils/logger.js";
import { SERVER_NAME, SERVER_VERSION, isMainModule, startServer } from "../index.js";

// Colors for console output
const colors = {
  red: "\x1b[31m",
  reset: "\x1b[0m",
};

export interface CliIO {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface CommonOptions {
  db?: string;
  logLevel?: string;
}

interface ServerOptions extends CommonOptions {
  transport?: string;
  host?: string;
  port?: string;
}

interface SearchOptions extends CommonOptions {
  limit: string;
  repo?: string;
  fileType?: string;
  technology?: string;
  tag?: string[];
}

interface DepsOptions extends CommonOptions {
  maxDepth: string;
}

// Accepts either a bare array of file records or { files: [...] }
const ImportFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ files: z.array(z.unknown()) }).transform((value) => value.files),
]);

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--db <path>", "SQLite database path (overrides KB_DATABASE_PATH)")
    .addOption(new Option("--log-level <level>", "Log level (overrides LOG_LEVEL)").choices(LOG_LEVELS));
}

/**
 * Resolves configuration with CLI flags taking precedence over the environment.
 */
function resolveConfig(io: CliIO, options: ServerOptions): KnowledgeBaseConfig {
  return loadConfig({
    ...io.env,
    ...(options.db !== undefined ? { KB_DATABASE_PATH: options.db } : {}),
    ...(options.logLevel !== undefined ? { LOG_LEVEL: options.logLevel } : {}),
    ...(options.transport !== undefined ? { KB_TRANSPORT: options.transport } : {}),
    ...(options.host !== undefined ? { KB_HTTP_HOST: options.host } : {}),
    ...(options.port !== undefined ? { KB_HTTP_PORT: options.port } : {}),
  });
}

/**
 * Runs one tool against the configured database and prints its JSON result.
 * Tool errors are printed to stderr and set a non-zero exit code.
 */
async function runTool(io: CliIO, options: CommonOptions, name: string, args: Record<string, unknown>): Promise<void> {
  const config = resolveConfig(io, options);
  Logger.configure(config.logging);

  const server = new McpToolsServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    databasePath: config.databasePath,
  });

  try {
    await server.initialize();
    const result = await server.callTool(name, args);
    const text = result.content
      .flatMap((item) => (item.type === "text" ? [item.text] : []))
      .join("\n");

    if (result.isError) {
      io.stderr(`${colors.red}${text}${colors.reset}\n`);
      process.exitCode = 1;
    } else {
      io.stdout(`${text}\n`);
    }
  } finally {
    await server.stop();
  }
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("repo-kb")
    .description("Repository knowledge base: index per-file source knowledge and query it over MCP")
    .version(SERVER_VERSION);

  // MCP Server command
  withCommonOptions(
    program
      .command("server")
      .description("Start the MCP server")
      .addOption(new Option("-t, --transport <transport>", "Transport (overrides KB_TRANSPORT)").choices(TRANSPORTS))
      .option("-H, --host <address>", "HTTP host (overrides KB_HTTP_HOST)")
      .option("-p, --port <number>", "HTTP port (overrides KB_HTTP_PORT)")
  ).action(async (options: ServerOptions) => {
    await startServer(resolveConfig(io, options));
  });

  withCommonOptions(
    program.command("stats").description("Print knowledge base statistics")
  ).action(async (options: CommonOptions) => {
    await runTool(io, options, "get_stats", {});
  });

  withCommonOptions(
    program
      .command("search")
      .description("Keyword search over indexed files")
      .argument("<terms...>", "Search terms")
      .option("-l, --limit <number>", "Maximum number of results", "50")
      .option("-r, --repo <name>", "Only search this repository")
      .addOption(new Option("-f, --file-type <type>", "Only search this file type").choices(FILE_TYPES))
      .addOption(new Option("-T, --technology <technology>", "Only search this technology").choices(TECHNOLOGIES))
      .option("--tag <tag>", "Only search files with this tag (repeatable)", collect)
  ).action(async (terms: string[], options: SearchOptions) => {
    await runTool(io, options, "search_knowledge", {
      query: terms.join(" "),
      limit: Number(options.limit),
      repo: options.repo,
      file_type: options.fileType,
      technology: options.technology,
      tags: options.tag,
    });
  });

  withCommonOptions(
    program
      .command("context")
      .description("Show the record for a path and the files that depend on it")
      .argument("<path>", "Exact indexed path")
  ).action(async (path: string, options: CommonOptions) => {
    await runTool(io, options, "get_file_context", { path });
  });

  withCommonOptions(
    program
      .command("deps")
      .description("Analyze the dependencies of a path")
      .argument("<path>", "Root path")
      .option("-m, --max-depth <number>", "Maximum traversal depth", "10")
  ).action(async (path: string, options: DepsOptions) => {
    await runTool(io, options, "analyze_dependencies", { path, max_depth: Number(options.maxDepth) });
  });

  withCommonOptions(
    program
      .command("import")
      .description("Index file records from a JSON file (an array, or { files: [...] })")
      .argument("<file>", "JSON file to import")
  ).action(async (file: string, options: CommonOptions) => {
    const parsed = ImportFileSchema.safeParse(JSON.parse(readFileSync(file, "utf8")));
    if (!parsed.success) {
      io.stderr(`${colors.red}${file} must contain an array of file records or { "files": [...] }${colors.reset}\n`);
      process.exitCode = 1;
      return;
    }
    await runTool(io, options, "index_batch", { files: parsed.data });
  });

  return program;
}

if (isMainModule(import.meta.url)) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`${colors.red}${error instanceof Error ? error.message : String(error)}${colors.reset}\n`);
      process.exit(1);
    });
}
