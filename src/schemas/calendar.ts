import { z } from "zod";

/**
 * Parameters for list_upcoming_events tool.
 */
export const ListUpcomingEventsParams = z.object({
  max_results: z
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Max events to return. Default 10."),
  time_min: z
    .string()
    .datetime({ offset: true })
    .optional()
    .describe("Start time in ISO format (YYYY-MM-DDTHH:MM:SSZ). Defaults to now."),
});

export type ListUpcomingEventsParamsType = z.infer<typeof ListUpcomingEventsParams>;

/**
 * Parameters for create_event tool.
 *
 * Temporal validation (end after start) happens in the handler: .refine()
 * produces a ZodEffects, and the MCP SDK needs the plain object's .shape.
 */
export const CreateEventParams = z.object({
  summary: z.string().min(1).describe("The title of the event."),
  start_time: z
    .string()
    .min(1)
    .describe("Start time in ISO 8601 format (e.g., 2024-12-31T10:00:00Z)."),
  end_time: z.string().min(1).describe("End time in ISO 8601 format."),
  description: z.string().default("").describe("Description/body of the event."),
});

export type CreateEventParamsType = z.infer<typeof CreateEventParams>;
