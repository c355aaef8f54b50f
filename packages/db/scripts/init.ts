import "dotenv/config";
import { createPgSessionFactory } from "../src/bootstrap/session";
import { SchemaInitializer, isBootstrapError } from "../src/bootstrap/initializer";
import { describeTarget, loadConfig } from "../src/config";
import { createLogger } from "../src/logger";

/**
 * Drops and rebuilds the whole schema, then seeds the default tenant and
 * billing plans.
 *
 * Every table in the plan is dropped first. Call with `npm run db:init`;
 * configuration comes from the environment (or `.env`).
 */
async function run() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info(`Initializing database at ${describeTarget(config.database)}`);

  const initializer = new SchemaInitializer(createPgSessionFactory(config.database), {
    extensions: config.bootstrap.extensions,
    atomic: config.bootstrap.atomic,
    logger,
  });
  await initializer.initialize();
}

run().catch((error: unknown) => {
  if (isBootstrapError(error)) {
    console.error(`Database initialization failed: ${error.message}`);
  } else {
    console.error("Database initialization failed:", error);
  }
  process.exit(1);
});
