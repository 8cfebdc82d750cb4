import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { taskIdSchema, taskTextSchema } from "../schemas/commonSchemas.js";
import type { TaskStore } from "../../domain/task/services/TaskStore.js";
import { createTextResponse } from "./responses.js";

const manageTaskActionSchema = z.enum(['create', 'update', 'toggle', 'delete']);

const manageTaskShape = {
    action: manageTaskActionSchema.describe("Management action to perform (required)"),
    taskId: taskIdSchema.optional().describe("Task ID (for update, toggle, delete)"),
    text: taskTextSchema.optional().describe("Task text (for create, update)")
};

const manageTaskSchema = z.object(manageTaskShape);

type ManageTaskParams = z.infer<typeof manageTaskSchema>;

export function registerManageTaskTool(server: McpServer, store: TaskStore): void {
    server.tool(
        "manageTask",
        "Manages single tasks: create, update text, toggle completion, delete.",
        manageTaskShape,
        async (params: ManageTaskParams) => {
            const { action, taskId, text } = manageTaskSchema.parse(params);

            try {
                const requireTaskId = (): number => {
                    if (taskId === undefined) throw new Error(`taskId is required for action '${action}'.`);
                    return taskId;
                };
                const requireText = (): string => {
                    if (text === undefined) throw new Error(`text is required for action '${action}'.`);
                    return text;
                };
                const notFound = (id: number) => createTextResponse(`No changes made: task ${id} not found.`);

                switch (action) {
                    case 'create': {
                        const newId = store.nextId;
                        store.create(requireText());
                        if (store.nextId === newId) {
                            return createTextResponse("No task created: text is blank.");
                        }
                        return createTextResponse(`Task created with ID: ${newId}.`);
                    }

                    case 'update': {
                        const id = requireTaskId();
                        const newText = requireText();
                        if (!store.getTaskById(id)) return notFound(id);
                        if (!newText.trim()) {
                            return createTextResponse(`No changes made: text is blank, task ${id} keeps its text.`);
                        }
                        store.update(id, newText);
                        return createTextResponse(`Updated text for task ${id}.`);
                    }

                    case 'toggle': {
                        const id = requireTaskId();
                        store.toggle(id);
                        const task = store.getTaskById(id);
                        if (!task) return notFound(id);
                        return createTextResponse(`Task ${id} marked as ${task.completed ? 'completed' : 'incomplete'}.`);
                    }

                    case 'delete': {
                        const id = requireTaskId();
                        if (!store.getTaskById(id)) return notFound(id);
                        store.delete(id);
                        return createTextResponse(`Task ${id} deleted successfully.`);
                    }
                }
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                return createTextResponse(`Error processing action '${action}': ${message}`, true);
            }
        }
    );
}
