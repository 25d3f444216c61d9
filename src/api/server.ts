import Fastify from "fastify";
import type { FastifyBaseLogger } from "fastify";
import type { SchedulingEngine } from "../core/engine.js";
import type { Logger } from "../logger.js";
import routes from "./routes.js";

export function buildApp(engine: SchedulingEngine, logger: Logger) {
  const base: FastifyBaseLogger = logger;
  const app = Fastify({ logger: base });

  app.register(routes, { engine });

  return app;
}

export type App = ReturnType<typeof buildApp>;

export async function startServer(app: App, port: number = 3000, host: string = "0.0.0.0") {
  try {
    await app.listen({ port, host });
    app.log.info(`Server listening on http://${host}:${port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  return app;
}
