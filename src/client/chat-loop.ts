import { join } from "node:path";
import {
  InvalidClientError,
  UnauthorizedClientError,
} from "@modelcontextprotocol/sdk/server/auth/errors.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import OpenAI from "openai";
import { DiskStore } from "../storage/disk-store.js";
import { createLogger } from "../utils/logger.js";
import { waitForAuthorizationCode } from "./callback-server.js";
import { type ChatCompletionsApi, ChatSession, type ToolCaller } from "./chat-session.js";
import type { ClientConfig } from "./config.js";
import { connectWithAuth } from "./connect.js";
import { FileOAuthClientProvider } from "./oauth-provider.js";
import { convertMcpToOpenAiTools } from "./tools.js";

const logger = createLogger("chat-loop");

const MAX_AUTH_ATTEMPTS = 2;
const EXIT_COMMANDS = ["quit", "exit"];

/** Connected MCP client, as far as the chat loop is concerned. */
export interface McpToolClient extends ToolCaller {
  listTools(): Promise<{ tools: Tool[] }>;
  close(): Promise<void>;
}

export interface ChatIO {
  lines: AsyncIterable<string>;
  print(line: string): void;
  prompt(text: string): void;
}

export interface ChatLoopDeps {
  connect?: (authProvider: FileOAuthClientProvider) => Promise<McpToolClient>;
  completions?: ChatCompletionsApi;
}

export interface ChatLoopOptions {
  profile: string;
  config: ClientConfig;
  io: ChatIO;
  deps?: ChatLoopDeps;
}

/** True when the server no longer recognises the stored client registration. */
export function isClientRejected(error: unknown): boolean {
  return error instanceof InvalidClientError || error instanceof UnauthorizedClientError;
}

function createCompletions(config: ClientConfig): ChatCompletionsApi {
  const openai = new OpenAI({ apiKey: config.openai.apiKey });
  return { create: (body) => openai.chat.completions.create(body) };
}

async function converse(client: McpToolClient, options: ChatLoopOptions): Promise<void> {
  const { config, io } = options;

  const { tools: mcpTools } = await client.listTools();
  const tools = convertMcpToOpenAiTools(mcpTools);
  io.print(`✓ Discovered tools: ${tools.map((t) => t.function.name).join(", ")}`);

  const session = new ChatSession({
    completions: options.deps?.completions ?? createCompletions(config),
    toolCaller: client,
    tools,
    model: config.openai.model,
    maxToolRounds: config.chat.maxToolRounds,
    print: (line) => io.print(line),
  });

  io.print(`\n--- ${config.openai.model} Calendar Assistant (Type 'quit' to exit) ---`);
  io.prompt("\nUser: ");
  for await (const line of io.lines) {
    const input = line.trim();
    if (EXIT_COMMANDS.includes(input.toLowerCase())) {
      return;
    }
    if (input) {
      try {
        const reply = await session.send(input);
        io.print(`\nAssistant: ${reply}`);
      } catch (error) {
        logger.debug({ error }, "Chat turn failed");
        io.print(`Error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    io.prompt("\nUser: ");
  }
}

/**
 * Runs the interactive chat against the MCP server.
 *
 * OAuth state lives in `<storageDir>/<profile>`. When the server rejects the
 * stored client registration (e.g. its storage was reset) the profile is
 * wiped and the login runs once more.
 */
export async function runChatLoop(options: ChatLoopOptions): Promise<void> {
  const { profile, config, io } = options;
  const serverUrl = config.mcp.serverUrl;
  const storageDir = join(config.auth.storageDir, profile);

  io.print(`--- Connecting to MCP Server at ${serverUrl} ---`);
  io.print(`--- Using profile: ${profile} ---`);

  for (let attempt = 0; attempt < MAX_AUTH_ATTEMPTS; attempt++) {
    const store = new DiskStore(storageDir);
    const authProvider = new FileOAuthClientProvider(store, {
      serverUrl,
      redirectUrl: `http://localhost:${config.auth.callbackPort}/callback`,
      onRedirect: (url) => {
        io.print(`\nOpen this URL in your browser to authorize:\n\n${url.toString()}\n`);
      },
    });

    try {
      const connect =
        options.deps?.connect ??
        ((provider: FileOAuthClientProvider) =>
          connectWithAuth({
            url: new URL(serverUrl),
            authProvider: provider,
            waitForCode: () => waitForAuthorizationCode(config.auth.callbackPort),
          }));
      const client = await connect(authProvider);
      io.print("✓ Connected to Server & Authenticated");

      try {
        await converse(client, options);
      } finally {
        await client.close();
      }
      return;
    } catch (error) {
      if (!isClientRejected(error)) {
        throw error;
      }

      io.print("! Client credentials rejected by server (likely server storage reset).");
      io.print("! Clearing local cache and re-authenticating...");
      await store.clear();

      if (attempt === MAX_AUTH_ATTEMPTS - 1) {
        io.print("x Failed to authenticate after cleaning cache.");
        throw error;
      }
    }
  }
}
