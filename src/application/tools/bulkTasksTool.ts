import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TaskStore } from "../../domain/task/services/TaskStore.js";
import { createTextResponse } from "./responses.js";

const bulkTasksShape = {
    action: z.enum(['completeAll', 'deleteAll']).describe("Bulk action to perform (required)")
};

const bulkTasksSchema = z.object(bulkTasksShape);

type BulkTasksParams = z.infer<typeof bulkTasksSchema>;

export function registerBulkTasksTool(server: McpServer, store: TaskStore): void {
    server.tool(
        "bulkTasks",
        "Applies an action to every task: mark all completed or delete all.",
        bulkTasksShape,
        async (params: BulkTasksParams) => {
            const { action } = bulkTasksSchema.parse(params);

            if (action === 'completeAll') {
                const updated = store.statistics().pending;
                store.markAllCompleted();
                return createTextResponse(`Marked ${updated} task(s) as completed.`);
            }

            const removed = store.statistics().total;
            store.deleteAll();
            return createTextResponse(`Deleted ${removed} task(s).`);
        }
    );
}
