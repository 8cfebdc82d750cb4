import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { TaskListApp } from "./app.js";
import { TaskStore } from "../domain/task/services/TaskStore.js";

type ToolArgs = Record<string, unknown>;

describe("TaskListApp tools", () => {
  let app: TaskListApp;
  let client: Client;

  beforeEach(async () => {
    app = new TaskListApp({}, new TaskStore(() => new Date(2024, 2, 5, 9, 7)));
    client = new Client({ name: "task-list-test", version: "1.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await app.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await app.close();
  });

  async function call(name: string, args: ToolArgs = {}): Promise<{ text: string; isError: boolean }> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    return {
      text: first && first.type === "text" ? first.text : "",
      isError: result.isError === true,
    };
  }

  it("registers every tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "bulkTasks",
      "getTaskStatistics",
      "listTasks",
      "manageTask",
    ]);
  });

  it("creates tasks and reports blank text as unchanged", async () => {
    expect(await call("manageTask", { action: "create", text: "  Buy milk " })).toEqual({
      text: "Task created with ID: 1.",
      isError: false,
    });
    expect(await call("manageTask", { action: "create", text: "   " })).toEqual({
      text: "No task created: text is blank.",
      isError: false,
    });
    expect(app.getStore().tasks.map((task) => task.text)).toEqual(["Buy milk"]);
  });

  it("lists tasks with statistics", async () => {
    await call("manageTask", { action: "create", text: "Buy milk" });
    await call("manageTask", { action: "create", text: "Walk dog" });
    expect(await call("manageTask", { action: "toggle", taskId: 1 })).toEqual({
      text: "Task 1 marked as completed.",
      isError: false,
    });

    const listed = await call("listTasks");
    expect(listed.text).toBe(
      [
        "Tasks:",
        "- #1 [x] Buy milk (created 2024-03-05 09:07)",
        "- #2 [ ] Walk dog (created 2024-03-05 09:07)",
        "Total: 2 | Completed: 1 | Pending: 1",
      ].join("\n")
    );

    const incomplete = await call("listTasks", { filter: "incomplete" });
    expect(incomplete.text).toBe(
      "Tasks:\n- #2 [ ] Walk dog (created 2024-03-05 09:07)\nTotal: 2 | Completed: 1 | Pending: 1"
    );
  });

  it("describes empty filtered views", async () => {
    expect((await call("listTasks", { filter: "completed" })).text).toBe(
      "No tasks found with filter 'completed'.\nTotal: 0 | Completed: 0 | Pending: 0"
    );
    expect((await call("listTasks")).text).toBe("No tasks found.\nTotal: 0 | Completed: 0 | Pending: 0");
  });

  it("updates, deletes and reports unknown ids", async () => {
    await call("manageTask", { action: "create", text: "Draft" });

    expect((await call("manageTask", { action: "update", taskId: 1, text: " Final " })).text).toBe(
      "Updated text for task 1."
    );
    expect((await call("manageTask", { action: "update", taskId: 1, text: " " })).text).toBe(
      "No changes made: text is blank, task 1 keeps its text."
    );
    expect(app.getStore().getTaskById(1)?.text).toBe("Final");

    expect((await call("manageTask", { action: "toggle", taskId: 9 })).text).toBe(
      "No changes made: task 9 not found."
    );
    expect((await call("manageTask", { action: "delete", taskId: 1 })).text).toBe(
      "Task 1 deleted successfully."
    );
    expect((await call("manageTask", { action: "delete", taskId: 1 })).text).toBe(
      "No changes made: task 1 not found."
    );
  });

  it("flags missing arguments as errors", async () => {
    expect(await call("manageTask", { action: "update", text: "x" })).toEqual({
      text: "Error processing action 'update': taskId is required for action 'update'.",
      isError: true,
    });
    expect(await call("manageTask", { action: "create" })).toEqual({
      text: "Error processing action 'create': text is required for action 'create'.",
      isError: true,
    });
  });

  it("runs bulk actions and keeps counting ids", async () => {
    await call("manageTask", { action: "create", text: "a" });
    await call("manageTask", { action: "create", text: "b" });
    await call("manageTask", { action: "toggle", taskId: 2 });

    expect((await call("bulkTasks", { action: "completeAll" })).text).toBe("Marked 1 task(s) as completed.");
    expect((await call("getTaskStatistics")).text).toBe("Total: 2 | Completed: 2 | Pending: 0");

    expect((await call("bulkTasks", { action: "deleteAll" })).text).toBe("Deleted 2 task(s).");
    expect((await call("manageTask", { action: "create", text: "c" })).text).toBe("Task created with ID: 3.");
  });
});
