export { McpToolsServer, type McpServerOptions } from "./McpServer.js";
