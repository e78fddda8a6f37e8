import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CalendarServiceFactory } from "../auth/calendar-client.js";
import type { Config } from "../config.js";

/** Signature for tool registration functions. */
export type ToolRegistrationFn = (
  server: McpServer,
  calendarFactory: CalendarServiceFactory,
  config: Config,
) => void;

/** Standard MCP tool result shape returned by all tool handlers. */
export type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };
