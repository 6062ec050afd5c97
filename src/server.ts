import dotenv from "dotenv";
dotenv.config();

import type { Server } from "http";
import { createApp, startHttpServer } from "./app";
import { loadConfig } from "./config/env";
import { connectDB, disconnectDB } from "./config/db";
import { getMovieModel } from "./models/movie";
import { ingestMedia } from "./services/ingest.service";
import { MongoMovieCollection } from "./services/movie.store";
import { TelegramListener } from "./services/telegram.listener";
import { TmdbClient } from "./services/tmdb.client";
import logger from "./utils/logger";

async function start(): Promise<void> {
  // throws ConfigError before anything connects
  const config = loadConfig();

  const connection = await connectDB(config.mongoUri, config.dbName);
  const model = getMovieModel(connection, config.collectionName);
  await model.init(); // unique (title, releaseDate) index

  const deps = {
    metadata: new TmdbClient({
      apiKey: config.tmdbApiKey,
      baseUrl: config.tmdbBaseUrl,
      timeoutMs: config.httpTimeoutMs,
    }),
    movies: MongoMovieCollection.fromModel(model),
    imageBaseUrl: config.tmdbImageBaseUrl,
  };

  const listener = new TelegramListener(
    {
      botToken: config.botToken,
      apiUrl: config.telegramApiUrl,
      pollTimeoutSeconds: config.pollTimeoutSeconds,
    },
    (media) => ingestMedia(deps, media),
  );

  const app = createApp({ listenerRunning: () => listener.running });
  let server: Server;
  try {
    server = await startHttpServer(app, config.port);
  } catch (error) {
    await disconnectDB(connection);
    throw error;
  }
  logger.info(`Health endpoint listening on port ${config.port}`);

  logger.info("Bot started. Initializing...");
  listener.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("%s received, shutting down", signal);
    try {
      await listener.stop();
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve())),
      );
      await disconnectDB(connection);
      process.exit(0);
    } catch (error) {
      logger.error("Shutdown failed: %s", String(error));
      process.exit(1);
    }
  };
  server.on("error", (error) => {
    logger.error("Health server error: %s", error.message);
    void shutdown("server error");
  });
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

start().catch((error: unknown) => {
  logger.error("Failed to start: %s", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
