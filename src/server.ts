import { randomUUID } from "node:crypto";
import { requireBearerAuth } from "@modelcontextprotocol/sdk/server/auth/middleware/bearerAuth.js";
import {
  getOAuthProtectedResourceMetadataUrl,
  mcpAuthRouter,
} from "@modelcontextprotocol/sdk/server/auth/router.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import express, { type Express, type Request, type Response } from "express";
import { type CalendarServiceFactory, createCalendarServiceFactory } from "./auth/calendar-client.js";
import { CALLBACK_PATH, type CallbackQuery, type GoogleOAuthProvider } from "./auth/google-provider.js";
import type { Config } from "./config.js";
import { registerCalendarCreateTools } from "./tools/calendar-create.js";
import { registerCalendarEventTools } from "./tools/calendar-events.js";
import type { ToolRegistrationFn } from "./types/tools.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("server");

export const SERVER_NAME = "Google Calendar Professional";
export const SERVER_VERSION = "0.1.0";
export const SERVER_INSTRUCTIONS = "Enterprise-grade Google Calendar integration with persistent OAuth.";

const registrations: ToolRegistrationFn[] = [
  registerCalendarEventTools,
  registerCalendarCreateTools,
];

/** Builds an MCP server with every calendar tool registered. */
export function createMcpServer(config: Config, calendarFactory: CalendarServiceFactory): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: SERVER_INSTRUCTIONS },
  );
  for (const register of registrations) {
    register(server, calendarFactory, config);
  }
  return server;
}

export interface AppDeps {
  config: Config;
  provider: GoogleOAuthProvider;
  calendarFactory?: CalendarServiceFactory;
}

export interface McpApp {
  app: Express;
  /** Closes every open MCP session on this instance. */
  closeSessions(): Promise<void>;
}

function readQueryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toCallbackQuery(req: Request): CallbackQuery {
  return {
    code: readQueryString(req.query.code),
    state: readQueryString(req.query.state),
    error: readQueryString(req.query.error),
    error_description: readQueryString(req.query.error_description),
  };
}

/**
 * Express app serving the OAuth proxy endpoints and both MCP transports:
 *
 * - `GET /sse` + `POST /messages?sessionId=`: legacy HTTP+SSE transport
 * - `POST|GET|DELETE /mcp`: Streamable HTTP transport
 *
 * Every MCP route requires a bearer token carrying the configured scopes.
 * Transport sessions are held in memory, so a session sticks to the
 * instance that created it; OAuth state is shared through the store.
 */
export function createApp(deps: AppDeps): McpApp {
  const { config, provider } = deps;
  const calendarFactory = deps.calendarFactory ?? createCalendarServiceFactory(config);
  const serverUrl = new URL(config.server.url);

  const app = express();

  app.use(
    mcpAuthRouter({
      provider,
      issuerUrl: serverUrl,
      baseUrl: serverUrl,
      scopesSupported: provider.scopes,
      resourceName: SERVER_NAME,
    }),
  );

  app.get(CALLBACK_PATH, async (req: Request, res: Response) => {
    const result = await provider.handleCallback(toCallbackQuery(req));
    if (result.status === 302) {
      res.redirect(302, result.location);
      return;
    }
    res.status(400).type("text/plain").send(result.message);
  });

  const bearerAuth = requireBearerAuth({
    verifier: provider,
    requiredScopes: provider.scopes,
    resourceMetadataUrl: getOAuthProtectedResourceMetadataUrl(serverUrl),
  });

  const sseTransports = new Map<string, SSEServerTransport>();
  const httpTransports = new Map<string, StreamableHTTPServerTransport>();

  app.get("/sse", bearerAuth, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport("/messages", res);
    sseTransports.set(transport.sessionId, transport);
    transport.onclose = () => {
      sseTransports.delete(transport.sessionId);
      logger.info({ sessionId: transport.sessionId }, "SSE session closed");
    };

    const server = createMcpServer(config, calendarFactory);
    await server.connect(transport);
    logger.info({ sessionId: transport.sessionId }, "SSE session opened");
  });

  app.post("/messages", bearerAuth, async (req: Request, res: Response) => {
    const sessionId = readQueryString(req.query.sessionId);
    const transport = sessionId ? sseTransports.get(sessionId) : undefined;
    if (!transport) {
      res.status(404).type("text/plain").send("Unknown session");
      return;
    }
    await transport.handlePostMessage(req, res);
  });

  app.post("/mcp", bearerAuth, express.json(), async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id");
    let transport = sessionId ? httpTransports.get(sessionId) : undefined;

    if (!transport) {
      if (sessionId || !isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      const created = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => {
          httpTransports.set(id, created);
          logger.info({ sessionId: id }, "HTTP session opened");
        },
      });
      created.onclose = () => {
        if (created.sessionId) {
          httpTransports.delete(created.sessionId);
          logger.info({ sessionId: created.sessionId }, "HTTP session closed");
        }
      };
      const server = createMcpServer(config, calendarFactory);
      await server.connect(created);
      transport = created;
    }

    await transport.handleRequest(req, res, req.body);
  });

  const handleSessionRequest = async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? httpTransports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).type("text/plain").send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", bearerAuth, handleSessionRequest);
  app.delete("/mcp", bearerAuth, handleSessionRequest);

  async function closeSessions(): Promise<void> {
    const transports = [...sseTransports.values(), ...httpTransports.values()];
    await Promise.all(transports.map((transport) => transport.close()));
    sseTransports.clear();
    httpTransports.clear();
  }

  return { app, closeSessions };
}
