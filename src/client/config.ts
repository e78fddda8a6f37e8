import { z } from "zod";
import { type Env, parseIntOr } from "../config.js";

const ClientConfigSchema = z.object({
  openai: z.object({
    apiKey: z.string().min(1),
    model: z.string().min(1).default("gpt-4o"),
  }),
  mcp: z.object({
    serverUrl: z.string().url().default("http://localhost:8000/sse"),
  }),
  auth: z.object({
    storageDir: z.string().min(1).default(".client_storage"),
    callbackPort: z.number().int().positive().max(65535).default(8765),
  }),
  chat: z.object({
    maxToolRounds: z.number().int().positive().default(5),
  }),
});

type ClientConfig = z.infer<typeof ClientConfigSchema>;

export function loadClientConfig(env: Env = process.env): ClientConfig {
  const apiKey = env.OPENAI_API_KEY ?? "";
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY not found in .env");
  }

  return ClientConfigSchema.parse({
    openai: {
      apiKey,
      model: env.OPENAI_MODEL ?? "gpt-4o",
    },
    mcp: {
      serverUrl: env.MCP_SERVER_URL ?? "http://localhost:8000/sse",
    },
    auth: {
      storageDir: env.CLIENT_STORAGE_DIR ?? ".client_storage",
      callbackPort: parseIntOr(env.OAUTH_CALLBACK_PORT, 8765),
    },
    chat: {
      maxToolRounds: parseIntOr(env.MAX_TOOL_ROUNDS, 5),
    },
  });
}

export { type ClientConfig, ClientConfigSchema };
