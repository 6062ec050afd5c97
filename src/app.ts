import type { Server } from "http";
import express, { Express } from "express";
import helmet from "helmet";
import morgan from "morgan";

import { errorHandler, notFound } from "./middleware/errorHandler";
import logger from "./utils/logger";

export interface HealthProbe {
  listenerRunning(): boolean;
}

// Small HTTP surface so the host can tell the bot process is alive
export function createApp(probe: HealthProbe) {
  const app = express();
  app.use(
    morgan("combined", {
      stream: { write: (message) => logger.info(message.trim()) },
    }),
  );
  app.use(helmet()); // basic security headers

  app.get("/health", (req, res) =>
    res.send({
      status: "ok",
      listener: probe.listenerRunning() ? "running" : "stopped",
      timestamp: Date.now(),
    }),
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}

/** Resolves once the port is bound; bind failures such as EADDRINUSE reject. */
export function startHttpServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
