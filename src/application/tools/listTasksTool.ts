import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { taskFilterSchema } from "../schemas/commonSchemas.js";
import type { TaskStore } from "../../domain/task/services/TaskStore.js";
import { formatStatistics, formatTaskLine } from "../../domain/task/dtos/TaskDto.js";
import { createTextResponse } from "./responses.js";

const listTasksShape = {
    filter: taskFilterSchema.optional().default('all').describe("Filter by completion (default: all)")
};

const listTasksSchema = z.object(listTasksShape);

type ListTasksParams = z.infer<typeof listTasksSchema>;

export function registerListTasksTool(server: McpServer, store: TaskStore): void {
    server.tool(
        "listTasks",
        "Lists tasks in creation order, optionally filtered by completion, with statistics.",
        listTasksShape,
        async (params: ListTasksParams) => {
            const { filter } = listTasksSchema.parse(params);
            const tasks = store.filtered(filter);
            const statsLine = formatStatistics(store.statistics());

            if (tasks.length === 0) {
                const emptyText = filter === 'all' ? "No tasks found." : `No tasks found with filter '${filter}'.`;
                return createTextResponse(`${emptyText}\n${statsLine}`);
            }

            const taskListText = tasks.map(formatTaskLine).join("\n");
            return createTextResponse(`Tasks:\n${taskListText}\n${statsLine}`);
        }
    );
}

export function registerGetTaskStatisticsTool(server: McpServer, store: TaskStore): void {
    server.tool(
        "getTaskStatistics",
        "Returns total, completed and pending task counts.",
        async () => createTextResponse(formatStatistics(store.statistics()))
    );
}
