/**
 * Migration Script
 *
 * Runs database migrations independently of server startup.
 *
 * Usage: npm run db:migrate
 *
 * This is useful for:
 *   - Setting up a fresh database
 *   - Running migrations in CI/CD pipelines
 *   - Running migrations without starting the server
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

import { closeDatabase, createLogger, initDatabase, loadConfig, runMigrations } from "@issuedesk/platform";

const logger = createLogger("migrate");

async function migrate() {
  const config = loadConfig();
  if (!config.database.url) {
    throw new Error("DATABASE_URL must be set to run migrations. See .env.example.");
  }

  logger.info("Starting database migration", {
    database: config.database.url.replace(/\/\/.*@/, "//***@"),
  });

  const { sql } = initDatabase(config.database.url);
  const created = await runMigrations(sql);

  logger.info("Done", { createdTables: created });
  await closeDatabase();
}

migrate().then(
  () => process.exit(0),
  async (err) => {
    logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
    await closeDatabase();
    process.exit(1);
  }
);
