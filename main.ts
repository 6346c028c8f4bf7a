import { serve } from "@hono/node-server";
import { config as loadDotenv } from "dotenv";
import { initializeAdapters } from "./src/config/adapters.ts";
import { appDI } from "./src/config/AppDI.ts";
import { ConfigResolver } from "./src/config/env.ts";
import { error, info } from "./src/config/logger.ts";

const DEFAULT_PORT = 8088;

/**
 * Main entry point for the HTTP server
 */
async function main(): Promise<void> {
  loadDotenv();

  const config = new ConfigResolver();
  const port = (await config.resolve()).match(
    (values) => values.port,
    (configError) => {
      error(`Configuration error: ${configError.message}`);
      return DEFAULT_PORT;
    },
  );

  const di = appDI.initialize({ ...initializeAdapters(), config }).match(
    (container) => container,
    (diError) => {
      error(`Failed to initialize DI container: ${diError.message}`);
      process.exit(1);
    },
  );

  const app = (await di.createHttpApp()).match(
    (created) => created,
    (diError) => {
      error(`Failed to create HTTP app: ${diError.message}`);
      process.exit(1);
    },
  );

  serve({ fetch: app.fetch, port }, (address) => {
    info(`Server running on http://localhost:${address.port}`);
  });
}

main().catch((e: unknown) => {
  error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
