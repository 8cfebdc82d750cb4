import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { TaskStore } from "../../domain/task/services/TaskStore.js";
import { registerManageTaskTool } from "./manageTaskTool.js";
import { registerListTasksTool, registerGetTaskStatisticsTool } from "./listTasksTool.js";
import { registerBulkTasksTool } from "./bulkTasksTool.js";

/**
 * Registers all application tools with the MCP server
 */
export function registerAllTools(server: McpServer, store: TaskStore): void {
  registerManageTaskTool(server, store);
  registerListTasksTool(server, store);
  registerGetTaskStatisticsTool(server, store);
  registerBulkTasksTool(server, store);
}
