import mongoose, { Connection } from "mongoose";
import logger from "../utils/logger";
import { StoreError } from "../utils/httpError";

/**
 * Opens a dedicated connection for the process. The caller owns it and must
 * hand it back to disconnectDB on shutdown.
 */
export const connectDB = async (
  mongoUri: string,
  dbName: string,
): Promise<Connection> => {
  try {
    const connection = await mongoose
      .createConnection(mongoUri, {
        dbName,
        serverSelectionTimeoutMS: 10000,
      })
      .asPromise();

    logger.info("MongoDB connected successfully (db: %s)", dbName);
    return connection;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StoreError(`MongoDB connection error: ${message}`, "DB_UNAVAILABLE");
  }
};

export const disconnectDB = async (connection: Connection): Promise<void> => {
  await connection.close();
  logger.info("MongoDB connection closed");
};
