import { ApiServer } from './infrastructure/api/server.js';
import { loadServerConfig } from './infrastructure/serverConfigLoader.js';

/**
 * API Server entry point
 */
async function main(): Promise<void> {
  const result = loadServerConfig();
  if (!result.success) {
    console.error(result.error);
    process.exit(1);
  }

  const { port, rateLimitWindowMs, rateLimitMax, sessionHeader } = result.config;
  const server = new ApiServer({ port, rateLimitWindowMs, rateLimitMax, sessionHeader });
  await server.start();
  console.log(`Task list API server started (session header: ${sessionHeader})`);

  const shutdown = async (signal: string): Promise<void> => {
    try {
      await server.stop();
      console.log(`Shutting down gracefully (${signal}).`);
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// Start the API server
main().catch((error) => {
  console.error('Failed to start API server:', error);
  process.exit(1);
});
