import {
  ContactCalendarManager,
  findDataDir,
  loadConfig,
  loadCredentials,
} from "@contact-dates/core";
import { createServer } from "./server.js";

async function main() {
  const dataDir = process.env.CONTACT_DATES_DIR ?? findDataDir();
  console.log(`Data directory: ${dataDir}`);

  // Configuration errors abort startup before any coordinator runs
  const manager = new ContactCalendarManager(
    loadConfig(dataDir),
    loadCredentials(dataDir),
  );

  const port = parseInt(process.env.PORT ?? "4321", 10);
  const host = process.env.HOST ?? "127.0.0.1";
  const server = await createServer({ manager });

  // First cycle of every calendar; failures are reported through /api/health
  await manager.start();

  try {
    await server.listen({ port, host });
    console.log(`\nContact calendars served at http://${host}:${port}`);
    console.log("Press Ctrl+C to stop\n");
  } catch (err) {
    console.error("Failed to start server:", err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      manager.stop();

      await server.close();
      console.log("Server closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
