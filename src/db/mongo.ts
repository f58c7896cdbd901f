/**
 * MongoDB client for the native driver.
 * Purpose: single entrypoint to the database handle (`getDb`), the client for
 * sessions/transactions (`getMongoClient`) and shutdown (`disconnectDb`).
 */
import { MongoClient, type Db } from "mongodb";

let client: MongoClient | null = null;
let connecting: Promise<MongoClient> | null = null;
let dbInstance: Db | null = null;

const getUri = (): string => {
  const uri = process.env.MONGO_URI;
  if (!uri) throw new Error("MongoDB URI not configured (MONGO_URI).");
  return uri;
};

const getDbName = (): string => process.env.DB_NAME ?? "shortcuts";

/**
 * Connects once and reuses the in-flight promise so concurrent callers share
 * one pool. A failed connect clears the promise so the next call retries.
 */
export async function getMongoClient(): Promise<MongoClient> {
  if (client) return client;
  if (!connecting) {
    const next = new MongoClient(getUri());
    connecting = next
      .connect()
      .then((connected) => {
        client = connected;
        return connected;
      })
      .catch((error: unknown) => {
        connecting = null;
        throw error;
      });
  }
  return connecting;
}

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  const connected = await getMongoClient();
  dbInstance = connected.db(getDbName());
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  connecting = null;
  dbInstance = null;
}
