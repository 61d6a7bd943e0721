import { createApp } from "./app";
import { config } from "./config";
import { createResolutionService } from "./services/context";
import { redisClient } from "./services/redis-client";

// Clean shutdown function
async function shutdown() {
  console.log("Shutting down gracefully...");

  try {
    await redisClient.disconnect();
    console.log("Redis connection closed");
  } catch (err) {
    console.error("Error during shutdown:", err);
  }

  process.exit(0);
}

async function start() {
  const service = await createResolutionService(config, redisClient);
  const app = createApp(service);

  app.listen(config.port, () => {
    console.log(`Server is running on port ${config.port}`);
    console.log(`API endpoints:`);
    console.log(`- GET http://localhost:${config.port}/api/resolve?ip={ip_address}`);
    console.log(`- GET http://localhost:${config.port}/health`);
  });

  // Listen for termination signals to close connections
  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

start().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
