import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { TaskStore } from "../domain/task/services/TaskStore.js";
import { registerAllTools } from "../application/tools/index.js";

/**
 * Configuration options for the task list app
 */
export interface TaskListConfig {
  /**
   * Name the MCP server announces to clients
   */
  serverName: string;

  /**
   * Version the MCP server announces to clients
   */
  serverVersion: string;
}

/**
 * Main application class that sets up the MCP server and its task store.
 * One process serves one session, so the app owns exactly one store.
 */
export class TaskListApp {
  private server: McpServer;
  private store: TaskStore;
  private config: TaskListConfig;

  constructor(config?: Partial<TaskListConfig>, store: TaskStore = new TaskStore()) {
    this.config = {
      serverName: "TaskList",
      serverVersion: "1.0.0",
      ...config
    };

    this.server = new McpServer({
      name: this.config.serverName,
      version: this.config.serverVersion,
    });

    this.store = store;
    registerAllTools(this.server, this.store);
  }

  getStore(): TaskStore {
    return this.store;
  }

  /**
   * Connect the server to a transport
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  /**
   * Start serving over stdio. Logs go to stderr since stdout carries the protocol.
   */
  async initialize(): Promise<void> {
    try {
      this.setupShutdownHandlers();
      await this.connect(new StdioServerTransport());
      console.error(`${this.config.serverName} server started.`);
    } catch (error) {
      console.error(`Failed to start ${this.config.serverName} server:`, error);
      process.exit(1);
    }
  }

  /**
   * Set up handlers for shutdown signals
   */
  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      try {
        await this.close();
        console.error(`Shutting down gracefully (${signal}).`);
        process.exit(0);
      } catch (error) {
        console.error("Error during shutdown:", error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}
