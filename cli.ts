/**
 * Job search MCP server over standard I/O.
 * For MCP hosts such as desktop assistants that spawn the server as a child process.
 */

import { config as loadDotenv } from "dotenv";
import { err, ok, Result, ResultAsync } from "neverthrow";
import { initializeAdapters } from "./src/config/adapters.ts";
import { AppDI, appDI, DIError } from "./src/config/AppDI.ts";
import { error, info } from "./src/config/logger.ts";

type CliError =
  | { type: "server"; message: string }
  | { type: "di"; error: DIError };

function setupDependencyInjection(): Result<AppDI, CliError> {
  loadDotenv();

  const diResult = appDI.initialize(initializeAdapters());
  if (diResult.isErr()) {
    return err({ type: "di", error: diResult.error });
  }

  return ok(diResult.value);
}

function startServer(): ResultAsync<void, CliError> {
  return setupDependencyInjection()
    .asyncAndThen((di) => {
      info("Starting job search MCP server", { tools: ["search_jobs"] });

      return ResultAsync.fromPromise(
        di.startMcpServer(),
        (e): CliError => ({
          type: "server",
          message: e instanceof Error ? e.message : String(e),
        }),
      ).andThen((result) =>
        result.mapErr((e): CliError =>
          e instanceof Error ? { type: "server", message: e.message } : { type: "di", error: e }
        )
      );
    });
}

function getErrorMessage(e: CliError): string {
  switch (e.type) {
    case "server":
      return `Server error: ${e.message}`;
    case "di":
      return `DI error: ${e.error.type} - ${e.error.message}`;
  }
}

void startServer().match(
  () => {
    // the transport keeps the process alive until stdin closes
  },
  (e) => {
    error(`Fatal error: ${getErrorMessage(e)}`);
    process.exit(1);
  },
);
