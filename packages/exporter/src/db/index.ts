import mongoose, { type Connection } from "mongoose";
import type { ExporterConfig } from "../config.js";

export type MongoOptions = ExporterConfig["mongo"];

/**
 * Open a dedicated connection to the application database.
 *
 * The exporter only reads, so index builds and collection creation are
 * switched off, and commands fail fast instead of buffering while the
 * server is unreachable.
 */
export async function openConnection(options: MongoOptions): Promise<Connection> {
  const conn = mongoose.createConnection(options.uri, {
    dbName: options.dbName,
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMS,
    readPreference: "secondaryPreferred",
    autoIndex: false,
    autoCreate: false,
    bufferCommands: false,
  });
  return conn.asPromise();
}
