import { Hono } from "hono";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { err, ok, Result } from "neverthrow";
import type { JobSearchUseCase } from "../application/ports/in/JobSearchUseCase.ts";
import { JobSearchService } from "../application/services/JobSearchService.ts";
import { PromptService } from "../application/services/PromptService.ts";
import { McpController } from "../adapters/in/mcp/McpController.ts";
import { registerPrompts } from "../adapters/in/mcp/McpPrompts.ts";
import { JobSearchController } from "../adapters/in/http/JobSearchController.ts";
import { internalErrorResponse, notFoundResponse } from "../adapters/in/http/errors.ts";
import { AdapterContainer } from "./adapters.ts";
import { debug, error, info, warn } from "./logger.ts";

export type DIError =
  | { type: "already_initialized"; message: string }
  | { type: "not_initialized"; message: string };

export interface ServerIdentity {
  readonly name: string;
  readonly version: string;
}

const FALLBACK_IDENTITY: ServerIdentity = { name: "iam", version: "1.0.0" };

/**
 * Dependency Injection container for the application
 */
export class AppDI {
  private adapters?: AdapterContainer;
  private jobSearchService?: JobSearchService;
  private promptService?: PromptService;
  private mcpController?: McpController;
  private httpController?: JobSearchController;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Initialize the DI container with adapters
   */
  initialize(adapterContainer: AdapterContainer): Result<this, DIError> {
    if (this.adapters) {
      return err({
        type: "already_initialized",
        message: "AppDI already initialized",
      });
    }

    this.adapters = adapterContainer;
    return ok(this);
  }

  private getAdapters(): Result<AdapterContainer, DIError> {
    if (!this.adapters) {
      return err({
        type: "not_initialized",
        message: "DI container not initialized. Call initialize() first.",
      });
    }
    return ok(this.adapters);
  }

  getJobSearchService(): Result<JobSearchUseCase, DIError> {
    return this.getAdapters().map((adapters) => {
      if (!this.jobSearchService) {
        this.jobSearchService = new JobSearchService(adapters.config, adapters.jobSearch);
      }
      return this.jobSearchService;
    });
  }

  getPromptService(): Result<PromptService, DIError> {
    return this.getAdapters().map((adapters) => {
      if (!this.promptService) {
        this.promptService = new PromptService(adapters.templates, adapters.config, this.now);
      }
      return this.promptService;
    });
  }

  getMcpController(): Result<McpController, DIError> {
    return this.getJobSearchService().map((service) => {
      if (!this.mcpController) {
        this.mcpController = new McpController(service);
      }
      return this.mcpController;
    });
  }

  getHttpController(): Result<JobSearchController, DIError> {
    return this.getJobSearchService().map((service) => {
      if (!this.httpController) {
        this.httpController = new JobSearchController(service);
      }
      return this.httpController;
    });
  }

  /**
   * Server name and version from configuration. A configuration problem
   * does not stop the server; tool calls report it instead.
   */
  async resolveIdentity(): Promise<Result<ServerIdentity, DIError>> {
    const adaptersResult = this.getAdapters();
    if (adaptersResult.isErr()) {
      return err(adaptersResult.error);
    }

    const config = await adaptersResult.value.config.resolve();
    return ok(config.match(
      (values): ServerIdentity => ({ name: values.appName, version: values.appVersion }),
      (configError) => {
        warn("Configuration invalid, using default server identity", {
          type: configError.type,
          message: configError.message,
        });
        return FALLBACK_IDENTITY;
      },
    ));
  }

  async createMcpServer(): Promise<Result<McpServer, DIError>> {
    const identityResult = await this.resolveIdentity();
    if (identityResult.isErr()) {
      return err(identityResult.error);
    }
    const controllerResult = this.getMcpController();
    if (controllerResult.isErr()) {
      return err(controllerResult.error);
    }
    const promptsResult = this.getPromptService();
    if (promptsResult.isErr()) {
      return err(promptsResult.error);
    }

    const identity = identityResult.value;
    const server = new McpServer(
      { name: identity.name, version: identity.version },
      { capabilities: { tools: {}, prompts: {} } },
    );
    controllerResult.value.registerJobSearchTool(server);
    registerPrompts(server, promptsResult.value);

    info("MCP server configured", { name: identity.name, version: identity.version });
    return ok(server);
  }

  async startMcpServer(transport: Transport = new StdioServerTransport()): Promise<Result<void, DIError | Error>> {
    info("Starting MCP server with stdio transport...");

    const serverResult = await this.createMcpServer();
    if (serverResult.isErr()) {
      return err(serverResult.error);
    }

    const result = await this.connectToTransport(serverResult.value, transport);
    if (result.isErr()) {
      error(`Failed to start MCP server: ${result.error.message}`);
      return err(result.error);
    }

    info("MCP server connected via stdio transport");
    return ok(undefined);
  }

  private async connectToTransport(
    server: McpServer,
    transport: Transport,
  ): Promise<Result<void, Error>> {
    return await server.connect(transport)
      .then(() => {
        debug("MCP server transport connected");
        return ok<void, Error>(undefined);
      })
      .catch((transportError: unknown) => {
        const errorMessage = transportError instanceof Error
          ? transportError.message
          : String(transportError);
        error(`MCP server transport connection failed: ${errorMessage}`);
        return err<void, Error>(
          transportError instanceof Error ? transportError : new Error(errorMessage),
        );
      });
  }

  /**
   * Hono application: status route, /api routes, JSON 404 and 500
   */
  async createHttpApp(): Promise<Result<Hono, DIError>> {
    const identityResult = await this.resolveIdentity();
    if (identityResult.isErr()) {
      return err(identityResult.error);
    }
    const controllerResult = this.getHttpController();
    if (controllerResult.isErr()) {
      return err(controllerResult.error);
    }

    const identity = identityResult.value;
    const app = new Hono();
    app.use(logger((message) => info(message)));
    app.use(secureHeaders());

    app.get("/", (c) => {
      return c.json({
        name: identity.name,
        status: "running",
        version: identity.version,
      });
    });

    app.route("/api", controllerResult.value.createRouter());

    app.notFound((c) => notFoundResponse(c.req.path));

    app.onError((e) => {
      error("Unhandled HTTP error", { error: e.message });
      return internalErrorResponse();
    });

    return ok(app);
  }
}

// Singleton instance of the DI container
export const appDI = new AppDI();
