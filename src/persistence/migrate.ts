// pattern: Imperative Shell

import { loadConfig } from "../config/config.ts";
import { createLoggerFromConfig } from "../logging/logger.ts";
import { createPostgresProvider } from "./postgres.ts";

async function main(): Promise<void> {
  const config = loadConfig(process.env["LODESTAR_CONFIG"]);
  const logger = createLoggerFromConfig(config.logging);
  const db = createPostgresProvider(config.database, logger);

  try {
    await db.connect();
    logger.info("connected to database");

    await db.runMigrations();
    logger.info("migrations complete");
  } catch (error) {
    logger.error({ err: error }, "migration failed");
    process.exitCode = 1;
  } finally {
    await db.disconnect();
  }
}

void main();
