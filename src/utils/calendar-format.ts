import type { calendar_v3 } from "googleapis";

/** Start of an event: `dateTime` for timed events, `date` for all-day ones. */
export function formatEventStart(event: calendar_v3.Schema$Event): string {
  return event.start?.dateTime ?? event.start?.date ?? "";
}

/** One list line, e.g. `- 2026-03-02T09:00:00Z: Standup`. */
export function formatEventLine(event: calendar_v3.Schema$Event): string {
  return `- ${formatEventStart(event)}: ${event.summary ?? "No Title"}`;
}

export function formatEventList(events: calendar_v3.Schema$Event[]): string {
  if (events.length === 0) {
    return "No upcoming events found.";
  }
  return ["Upcoming events:", ...events.map(formatEventLine)].join("\n");
}

