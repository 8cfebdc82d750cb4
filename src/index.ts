#!/usr/bin/env node
import { TaskListApp } from "./core/app.js";
import { loadServerConfig } from "./infrastructure/serverConfigLoader.js";

/**
 * Application entry point
 */
async function main(): Promise<void> {
  const result = loadServerConfig();
  if (!result.success) {
    console.error(result.error);
    process.exit(1);
  }

  const app = new TaskListApp({ serverName: result.config.mcpServerName });
  await app.initialize();
}

// Start the application
main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
