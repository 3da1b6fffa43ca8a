import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import Fastify from "fastify";
import cors from "@fastify/cors";

import { registerRoutes } from "./api/routes";
import { settings } from "./core/config";
import { logger } from "./core/logger";
import { buildContainer } from "./services/container";
import type { ServiceContainer } from "./services/container";

declare module "fastify" {
  interface FastifyInstance {
    services: ServiceContainer;
  }
}

const httpLog = logger.child("http");

export const buildApp = async (services: ServiceContainer = buildContainer()) => {
  const app = Fastify({ logger: false });
  app.decorate("services", services);

  await app.register(cors, { origin: true });

  app.addHook("onResponse", async (request, reply) => {
    const line = `${request.method} ${request.url.split("?")[0] ?? request.url} ${reply.statusCode}`;
    if (reply.statusCode >= 500) httpLog.error(line);
    else httpLog.debug(line);
  });

  app.setErrorHandler(async (error, request, reply) => {
    httpLog.error(`${request.method} ${request.url} failed`, error);
    return reply.code(error.statusCode ?? 500).send({ error: error.message });
  });

  await registerRoutes(app);

  app.addHook("onClose", async () => {
    await app.services.shutdown();
  });

  return app;
};

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
};

if (isEntryPoint()) {
  const app = await buildApp();
  const stop = (signal: string): void => {
    logger.info(`${signal} received; shutting down`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  try {
    await app.listen({ host: settings.appHost, port: settings.appPort });
    logger.info(`${settings.appName} listening on http://${settings.appHost}:${settings.appPort}`);
  } catch (error) {
    logger.error("Failed to start server", error);
    process.exit(1);
  }
}
