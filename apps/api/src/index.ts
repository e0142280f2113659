/**
 * IssueDesk API Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { captureException, createLogger, flushObservability } from "@issuedesk/platform";
import { buildApp } from "./app.js";
import { bootstrap } from "./bootstrap.js";

const logger = createLogger("server");

async function main() {
  // 1. Bootstrap platform + domain
  const runtime = await bootstrap();
  const { config } = runtime;

  // 2. Build the HTTP application
  const app = await buildApp(config, runtime.services);

  // 3. Start server
  await app.listen({ port: config.api.port, host: config.api.host });
  logger.info("IssueDesk API listening", { url: `http://localhost:${config.api.port}` });

  // 4. Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    await app.close();
    await flushObservability(2000);
    await runtime.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch(async (err) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
