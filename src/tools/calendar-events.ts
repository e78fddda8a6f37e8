import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CalendarServiceFactory } from "../auth/calendar-client.js";
import type { Config } from "../config.js";
import { ListUpcomingEventsParams } from "../schemas/calendar.js";
import type { ToolResult } from "../types/tools.js";
import { formatEventList } from "../utils/calendar-format.js";
import { formatErrorForUser, mapCalendarError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("tools:calendar-events");

export function registerCalendarEventTools(
  server: McpServer,
  calendarFactory: CalendarServiceFactory,
  config: Config,
): void {
  server.tool(
    "list_upcoming_events",
    "List upcoming events from the primary calendar.",
    ListUpcomingEventsParams.shape,
    async (params, extra): Promise<ToolResult> => {
      try {
        const parsed = ListUpcomingEventsParams.parse(params);
        const calendar = calendarFactory(extra.authInfo);

        const maxResults = Math.min(parsed.max_results, config.limits.maxResults);
        const timeMin = parsed.time_min ?? new Date().toISOString();

        logger.info({ sessionId: extra.sessionId }, "Fetching events");
        const response = await calendar.events.list({
          calendarId: "primary",
          timeMin,
          maxResults,
          singleEvents: true,
          orderBy: "startTime",
        });

        const events = response.data.items ?? [];
        logger.info(
          { tool: "list_upcoming_events", eventCount: events.length, sessionId: extra.sessionId },
          "list_upcoming_events completed",
        );

        return { content: [{ type: "text", text: formatEventList(events) }] };
      } catch (error) {
        const mapped = mapCalendarError(error);
        logger.error(
          { tool: "list_upcoming_events", code: mapped.code, status: mapped.httpStatus },
          "API Error in list_upcoming_events",
        );
        return {
          content: [
            { type: "text", text: `Google Calendar API Error: ${formatErrorForUser(mapped)}` },
          ],
          isError: true,
        };
      }
    },
  );
}
