#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { runChatLoop } from "./chat-loop.js";
import { loadClientConfig } from "./config.js";

export interface CliArgs {
  profile: string;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { profile: "default", help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--profile") {
      const value = argv[i + 1];
      if (!value || value.startsWith("-")) {
        throw new Error("--profile requires a value");
      }
      args.profile = value;
      i++;
    } else if (arg.startsWith("--profile=")) {
      args.profile = arg.slice("--profile=".length);
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  if (!args.profile) {
    throw new Error("--profile requires a value");
  }
  return args;
}

export function showHelp(): void {
  console.log(`
Usage: gcal-mcp-chat [--profile <name>]

Options:
  --profile <name>  Client profile name for separate auth (default: "default")
  -h, --help        Show this help

Environment:
  OPENAI_API_KEY    Required
  MCP_SERVER_URL    Default: http://localhost:8000/sse
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    showHelp();
    return;
  }

  const config = loadClientConfig();
  const rl = createInterface({ input: process.stdin, terminal: false });
  try {
    await runChatLoop({
      profile: args.profile,
      config,
      io: {
        lines: rl,
        print: (line) => console.log(line),
        prompt: (text) => process.stdout.write(text),
      },
    });
  } finally {
    rl.close();
  }
}

// Only runs when executed directly, not when imported by tests
const isMain = process.argv[1] === fileURLToPath(import.meta.url);
if (isMain) {
  process.on("SIGINT", () => {
    console.log("\nGoodbye!");
    process.exit(0);
  });

  main().catch((error) => {
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
