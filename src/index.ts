/**
 * Bot entry point: builds the shortcuts runtime, attaches it to the Seyfert
 * client and starts the gateway connection.
 */
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";

import { disconnectDb } from "@/db/mongo";
import {
  MongoShortcutRepository,
  ShortcutsRuntime,
  browserTimeoutFromEnv,
} from "@/modules/shortcuts";

const client = new Client<true>();

client.shortcuts = new ShortcutsRuntime(new MongoShortcutRepository(), {
  browserTimeoutMs: browserTimeoutFromEnv(),
});

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  const indexes = await client.shortcuts.repository.ensureIndexes();
  if (indexes.isErr()) {
    throw indexes.error;
  }
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[bootstrap] ${signal} received, closing database connection`);
  await disconnectDb();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[bootstrap] Shutdown failed:", error);
      process.exit(1);
    });
  });
}

bootstrap().catch((error: unknown) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exit(1);
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {
    shortcuts: ShortcutsRuntime;
  }
  interface Client<Ready extends boolean = boolean> {
    shortcuts: ShortcutsRuntime;
  }
}
