import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  isInitializeRequest,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import * as http from "http";
import type { AddressInfo } from "net";
import { randomUUID } from "crypto";
import { DatabaseManager } from "../database/index.js";
import { KnowledgeBaseService } from "../services/KnowledgeBaseService.js";
import { KnowledgeBaseMcpTools } from "../tools/KnowledgeBaseTools.js";
import type { McpTool } from "../schemas/tools/index.js";
import { KnowledgeBaseError, errorMessage, toErrorBody } from "../utils/errors.js";
import { Logger } from "../utils/logger.js";
import type { Transport } from "../config/index.js";

export interface McpServerOptions {
  name: string;
  version: string;
  databasePath: string;
  transport?: Transport;
  httpHost?: string;
  httpPort?: number;
}

const DEFAULT_HTTP_HOST = "127.0.0.1";
const DEFAULT_HTTP_PORT = 8000;

/**
 * MCP front end for the knowledge base. Every tool call goes through
 * KnowledgeBaseMcpTools; handler failures become isError results.
 */
export class McpToolsServer {
  private readonly logger = new Logger("mcp-server");
  private readonly db: DatabaseManager;
  private readonly knowledgeBase: KnowledgeBaseService;
  private readonly tools: Map<string, McpTool>;
  private readonly transports: Record<string, StreamableHTTPServerTransport> = {};
  private stdioServer?: Server;
  private httpServer?: http.Server;

  constructor(
    private readonly options: McpServerOptions,
    db?: DatabaseManager
  ) {
    this.db = db ?? new DatabaseManager({ path: options.databasePath });
    this.knowledgeBase = new KnowledgeBaseService(this.db);
    const collection = new KnowledgeBaseMcpTools(this.knowledgeBase);
    this.tools = new Map(collection.getTools().map((tool) => [tool.name, tool]));
  }

  getAvailableTools(): McpTool[] {
    return [...this.tools.values()];
  }

  /**
   * Builds a protocol server with the tool handlers registered. HTTP mode
   * creates one per session; stdio uses a single instance.
   */
  createProtocolServer(): Server {
    const server = new Server(
      {
        name: this.options.name,
        version: this.options.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getAvailableTools().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: tool.annotations,
      })),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });

    return server;
  }

  /**
   * Runs one tool and wraps its result (or failure) as a CallToolResult.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    const requestId = randomUUID().slice(0, 8);
    const logger = new Logger(`tool-${name}`, requestId);

    const tool = this.tools.get(name);
    if (!tool) {
      logger.error(`Tool not found`, { name });
      throw new McpError(ErrorCode.MethodNotFound, `Tool "${name}" not found`);
    }

    logger.debug(`MCP CallTool request`, { name, args });

    try {
      const result = await tool.handler(args);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
        isError: false,
      };
    } catch (error) {
      const body = toErrorBody(error);
      if (error instanceof KnowledgeBaseError) {
        logger.warn(`Tool rejected request`, body.error);
      } else {
        logger.error(`Tool execution failed`, { error });
      }
      return {
        content: [{ type: "text" as const, text: JSON.stringify(body, null, 2) }],
        isError: true,
      };
    }
  }

  /** Opens the schema without starting a transport. */
  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  async start(): Promise<void> {
    await this.initialize();

    if ((this.options.transport ?? "stdio") === "http") {
      await this.startHttpTransport();
    } else {
      await this.startStdioTransport();
    }
  }

  private async startStdioTransport(): Promise<void> {
    const transport = new StdioServerTransport();
    this.stdioServer = this.createProtocolServer();
    await this.stdioServer.connect(transport);
    this.logger.info("MCP server listening on stdio", { tools: this.tools.size });
  }

  /**
   * Start MCP server with HTTP transport using StreamableHTTPServerTransport
   */
  private async startHttpTransport(): Promise<void> {
    const host = this.options.httpHost ?? DEFAULT_HTTP_HOST;
    const port = this.options.httpPort ?? DEFAULT_HTTP_PORT;

    const httpServer = http.createServer((req, res) => {
      const requestId = randomUUID().slice(0, 8);
      this.routeHttpRequest(req, res, requestId).catch((error: unknown) => {
        this.handleServerError(res, error, requestId);
      });
    });
    this.httpServer = httpServer;

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(port, host, () => {
        httpServer.off("error", reject);
        resolve();
      });
    });

    this.logger.info(`HTTP MCP server started on ${host}:${this.getHttpPort() ?? port}`);
  }

  /** Port the HTTP server is bound to, once started. */
  getHttpPort(): number | undefined {
    const address = this.httpServer?.address();
    return isAddressInfo(address) ? address.port : undefined;
  }

  private async routeHttpRequest(req: http.IncomingMessage, res: http.ServerResponse, requestId: string): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const logger = this.logger.child(requestId);
    logger.debug(`--> ${req.method} ${url.pathname}`);

    if (url.pathname === "/health") {
      return this.handleHealthCheck(res);
    }

    if (url.pathname === "/mcp" || url.pathname === "/") {
      return this.handleMcpEndpoint(req, res, logger);
    }

    return this.handle404(res);
  }

  private async handleHealthCheck(res: http.ServerResponse): Promise<void> {
    const database = await this.db.healthCheck();
    const body = {
      status: database.status === "healthy" ? "ok" : "degraded",
      name: this.options.name,
      version: this.options.version,
      tools: this.tools.size,
      database,
    };
    sendJson(res, database.status === "healthy" ? 200 : 503, body);
  }

  /**
   * Handle /mcp and / MCP protocol endpoints
   */
  private async handleMcpEndpoint(req: http.IncomingMessage, res: http.ServerResponse, logger: Logger): Promise<void> {
    const sessionId = headerValue(req.headers["mcp-session-id"]);

    if (req.method === "POST") {
      let requestData: unknown;
      try {
        requestData = JSON.parse(await readRequestBody(req));
      } catch (error) {
        logger.warn("Rejected unparseable request body", { error: errorMessage(error) });
        sendJson(res, 400, jsonRpcError(ErrorCode.ParseError, "Parse error"));
        return;
      }

      let transport = sessionId ? this.transports[sessionId] : undefined;

      if (!transport) {
        if (sessionId || !isInitializeRequest(requestData)) {
          sendJson(res, 400, jsonRpcError(-32000, "Bad Request: No valid session ID provided"));
          return;
        }
        transport = await this.createSessionTransport(logger);
      }

      await transport.handleRequest(req, res, requestData);
      return;
    }

    if (req.method === "GET" || req.method === "DELETE") {
      const transport = sessionId ? this.transports[sessionId] : undefined;
      if (!transport) {
        sendJson(res, 400, jsonRpcError(-32000, "Invalid or missing session ID"));
        return;
      }
      await transport.handleRequest(req, res);
      return;
    }

    sendJson(res, 405, jsonRpcError(-32000, "Method not allowed"));
  }

  private async createSessionTransport(logger: Logger): Promise<StreamableHTTPServerTransport> {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        this.transports[newSessionId] = transport;
        logger.info("MCP session initialized", { sessionId: newSessionId });
      },
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        delete this.transports[transport.sessionId];
      }
    };

    await this.createProtocolServer().connect(transport);
    return transport;
  }

  private handle404(res: http.ServerResponse): void {
    sendJson(res, 404, jsonRpcError(ErrorCode.MethodNotFound, "Method not found"));
  }

  private handleServerError(res: http.ServerResponse, error: unknown, requestId: string): void {
    this.logger.child(requestId).error("HTTP request failed", { error });
    if (res.headersSent) {
      res.end();
      return;
    }
    sendJson(res, 500, jsonRpcError(ErrorCode.InternalError, "Internal server error"));
  }

  async stop(): Promise<void> {
    for (const transport of Object.values(this.transports)) {
      await transport.close();
    }

    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
      this.httpServer = undefined;
    }

    if (this.stdioServer) {
      await this.stdioServer.close();
      this.stdioServer = undefined;
    }

    this.db.close();
    this.logger.info("MCP server stopped");
  }
}

function isAddressInfo(address: string | AddressInfo | null | undefined): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: "2.0", error: { code, message }, id: null };
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readRequestBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}
