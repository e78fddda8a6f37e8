import { z } from "zod";

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const ConfigSchema = z.object({
  google: z.object({
    clientId: z.string(),
    clientSecret: z.string(),
  }),
  server: z.object({
    host: z.string().min(1).default("0.0.0.0"),
    port: z.number().int().positive().max(65535).default(8000),
    url: z.string().url().default("http://localhost:8000"),
    logLevel: LogLevel.default("info"),
  }),
  redis: z.object({
    host: z.string().min(1).default("localhost"),
    port: z.number().int().positive().max(65535).default(6379),
    db: z.number().int().nonnegative().default(0),
  }),
  auth: z.object({
    requiredScopes: z
      .array(z.string().min(1))
      .default(["https://www.googleapis.com/auth/calendar.events"]),
    allowedRedirectUris: z.array(z.string().min(1)).optional(),
  }),
  limits: z.object({
    maxResults: z.number().int().positive().default(250),
  }),
});

type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseIntOr(value: string | undefined, fallback: number): number {
  return value ? Number.parseInt(value, 10) : fallback;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(env: Env = process.env): Config {
  const clientId = env.GOOGLE_CLIENT_ID ?? "";
  const clientSecret = env.GOOGLE_CLIENT_SECRET ?? "";
  if (!clientId || !clientSecret) {
    throw new Error("Missing required env variables: GOOGLE_CLIENT_ID or GOOGLE_CLIENT_SECRET.");
  }

  return ConfigSchema.parse({
    google: { clientId, clientSecret },
    server: {
      host: env.HOST ?? "0.0.0.0",
      port: parseIntOr(env.PORT, 8000),
      url: env.SERVER_URL ?? "http://localhost:8000",
      logLevel: env.LOG_LEVEL ?? "info",
    },
    redis: {
      host: env.REDIS_HOST ?? "localhost",
      port: parseIntOr(env.REDIS_PORT, 6379),
      db: parseIntOr(env.REDIS_DB, 0),
    },
    auth: {
      allowedRedirectUris: parseList(env.ALLOWED_REDIRECT_URIS),
    },
    limits: {
      maxResults: parseIntOr(env.MAX_RESULTS_LIMIT, 250),
    },
  });
}

type RedisConfig = Config["redis"];

export { type Config, ConfigSchema, type Env, type RedisConfig, parseIntOr };
