import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { calendar_v3 } from "googleapis";
import type { CalendarServiceFactory } from "../auth/calendar-client.js";
import type { Config } from "../config.js";
import { CreateEventParams, type CreateEventParamsType } from "../schemas/calendar.js";
import type { ToolResult } from "../types/tools.js";
import { ValidationError, formatErrorForUser, mapCalendarError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("tools:calendar-create");

export function buildEventBody(parsed: CreateEventParamsType): calendar_v3.Schema$Event {
  return {
    summary: parsed.summary,
    description: parsed.description,
    start: { dateTime: parsed.start_time, timeZone: "UTC" },
    end: { dateTime: parsed.end_time, timeZone: "UTC" },
  };
}

function validateTimeRange(parsed: CreateEventParamsType): void {
  const start = Date.parse(parsed.start_time);
  const end = Date.parse(parsed.end_time);
  if (Number.isNaN(start)) {
    throw new ValidationError(`start_time is not a valid ISO 8601 date-time: ${parsed.start_time}`);
  }
  if (Number.isNaN(end)) {
    throw new ValidationError(`end_time is not a valid ISO 8601 date-time: ${parsed.end_time}`);
  }
  if (end <= start) {
    throw new ValidationError("end_time must be after start_time");
  }
}

export function registerCalendarCreateTools(
  server: McpServer,
  calendarFactory: CalendarServiceFactory,
  _config: Config,
): void {
  server.tool(
    "create_event",
    "Create a new event in the primary calendar.",
    CreateEventParams.shape,
    async (params, extra): Promise<ToolResult> => {
      const startTime = Date.now();
      try {
        const parsed = CreateEventParams.parse(params);
        validateTimeRange(parsed);
        const calendar = calendarFactory(extra.authInfo);

        const response = await calendar.events.insert({
          calendarId: "primary",
          requestBody: buildEventBody(parsed),
        });

        logger.info(
          {
            tool: "create_event",
            sessionId: extra.sessionId,
            duration_ms: Date.now() - startTime,
          },
          "create_event completed",
        );

        return {
          content: [
            {
              type: "text",
              text: `Event created successfully. Link: ${response.data.htmlLink ?? ""}`,
            },
          ],
        };
      } catch (error) {
        const mapped = mapCalendarError(error);
        logger.error(
          {
            tool: "create_event",
            sessionId: extra.sessionId,
            code: mapped.code,
            status: mapped.httpStatus,
            duration_ms: Date.now() - startTime,
          },
          "create_event failed",
        );
        return {
          content: [{ type: "text", text: `Failed to create event: ${formatErrorForUser(mapped)}` }],
          isError: true,
        };
      }
    },
  );
}
