import { type OAuthClientProvider, UnauthorizedError } from "@modelcontextprotocol/sdk/client/auth.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("mcp-connect");

export const CLIENT_NAME = "gcal-mcp-chat";
export const CLIENT_VERSION = "0.1.0";

type AuthCapableTransport = SSEClientTransport | StreamableHTTPClientTransport;

/** A URL whose path ends in `/sse` selects the legacy SSE transport. */
export function createTransport(
  url: URL,
  authProvider: OAuthClientProvider,
): AuthCapableTransport {
  if (url.pathname.endsWith("/sse")) {
    return new SSEClientTransport(url, { authProvider });
  }
  return new StreamableHTTPClientTransport(url, { authProvider });
}

export interface ConnectOptions {
  url: URL;
  authProvider: OAuthClientProvider;
  /** Resolves with the authorization code once the user has logged in. */
  waitForCode: () => Promise<string>;
}

/**
 * Connects an MCP client. When the server demands authorization, waits for
 * the redirect code, completes the token exchange and connects again on a
 * fresh transport.
 */
export async function connectWithAuth(options: ConnectOptions): Promise<Client> {
  const { url, authProvider } = options;
  const client = new Client({ name: CLIENT_NAME, version: CLIENT_VERSION });
  const transport = createTransport(url, authProvider);

  try {
    await client.connect(transport);
    logger.debug({ url: url.toString() }, "Connected with stored credentials");
    return client;
  } catch (error) {
    if (!(error instanceof UnauthorizedError)) {
      throw error;
    }
  }

  logger.debug("Authorization required, waiting for redirect");
  const code = await options.waitForCode();
  await transport.finishAuth(code);

  const authorized = new Client({ name: CLIENT_NAME, version: CLIENT_VERSION });
  await authorized.connect(createTransport(url, authProvider));
  logger.debug({ url: url.toString() }, "Connected after authorization");
  return authorized;
}
