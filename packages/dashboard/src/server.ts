import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import { registerCalendarRoutes } from "./routes/calendar.js";
import type { ContactCalendarManager } from "@contact-dates/core";

export interface ServerOptions {
  manager: ContactCalendarManager;
  /** Fastify logger setting; pretty-printed pino at info level by default */
  logger?: FastifyServerOptions["logger"];
  /** Clock for default event windows, overridable in tests */
  now?: () => Date;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    calendarManager: ContactCalendarManager;
  }
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { manager } = options;

  const fastify = Fastify({
    logger: options.logger ?? {
      level: "info",
      transport: {
        target: "pino-pretty",
        options: {
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      },
    },
  });

  // Register CORS (allow all origins: read-only feeds for local clients)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("calendarManager", manager);

  // Surface coordinator notifications in the server log
  const unsubscribers: Array<() => void> = [];
  for (const calendar of manager.list()) {
    const log = fastify.log.child({ calendar: calendar.path });
    unsubscribers.push(
      calendar.coordinator.onChange((changes) => {
        log.info(
          `Events changed: ${changes.added.length} added, ${changes.updated.length} updated, ${changes.removed.length} removed`,
        );
      }),
      calendar.coordinator.onStatus((status) => {
        if (status.error) {
          log.warn(`Sync failed (${status.error.kind}): ${status.error.message}`);
        } else {
          log.info("Sync recovered");
        }
      }),
    );
  }
  fastify.addHook("onClose", async () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  });

  // Register calendar routes
  await registerCalendarRoutes(fastify, { now: options.now });

  return fastify;
}
