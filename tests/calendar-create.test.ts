import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { google } from "googleapis";
import { http, HttpResponse } from "msw";
import type { CalendarServiceFactory } from "../src/auth/calendar-client.js";
import { extractToolOutput } from "../src/client/chat-session.js";
import { loadConfig } from "../src/config.js";
import { CreateEventParams } from "../src/schemas/calendar.js";
import { buildEventBody, registerCalendarCreateTools } from "../src/tools/calendar-create.js";
import { type TestClient, connectTestClient } from "./helpers/mcp-test-client.js";
import { CALENDAR_BASE, createdEvent } from "./mocks/handlers/calendar.js";
import { server } from "./mocks/server.js";

vi.mock("../src/utils/logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

const EVENTS_URL = `${CALENDAR_BASE}/calendars/primary/events`;

const config = loadConfig({
  GOOGLE_CLIENT_ID: "test-client-id",
  GOOGLE_CLIENT_SECRET: "test-secret",
});

const calendarFactory: CalendarServiceFactory = () => {
  const auth = new google.auth.OAuth2("test-client-id", "test-secret");
  auth.setCredentials({ access_token: "test-user-token" });
  return google.calendar({ version: "v3", auth });
};

const validArgs = {
  summary: "Planning",
  start_time: "2026-03-10T10:00:00Z",
  end_time: "2026-03-10T11:00:00Z",
};

// ---------------------------------------------------------------------------
// Schema & request body
// ---------------------------------------------------------------------------

describe("CreateEventParams", () => {
  it("should default the description to an empty string", () => {
    expect(CreateEventParams.parse(validArgs).description).toBe("");
  });

  it("should require summary, start_time and end_time", () => {
    expect(CreateEventParams.safeParse({ ...validArgs, summary: "" }).success).toBe(false);
    expect(CreateEventParams.safeParse({ summary: "x", start_time: "2026-03-10T10:00:00Z" }).success).toBe(
      false,
    );
  });
});

describe("buildEventBody", () => {
  it("should pin start and end to UTC", () => {
    expect(buildEventBody({ ...validArgs, description: "Quarterly goals" })).toEqual({
      summary: "Planning",
      description: "Quarterly goals",
      start: { dateTime: "2026-03-10T10:00:00Z", timeZone: "UTC" },
      end: { dateTime: "2026-03-10T11:00:00Z", timeZone: "UTC" },
    });
  });
});

// ---------------------------------------------------------------------------
// create_event
// ---------------------------------------------------------------------------

describe("create_event", () => {
  let testClient: TestClient;

  beforeEach(async () => {
    const mcpServer = new McpServer({ name: "test", version: "0.0.0" });
    registerCalendarCreateTools(mcpServer, calendarFactory, config);
    testClient = await connectTestClient(mcpServer);
  });

  afterEach(async () => {
    await testClient.close();
  });

  it("should insert the event and return its link", async () => {
    let body: unknown;
    server.use(
      http.post(EVENTS_URL, async ({ request }) => {
        body = await request.json();
        return HttpResponse.json(createdEvent);
      }),
    );

    const result = await testClient.client.callTool({ name: "create_event", arguments: validArgs });

    expect(result.isError).toBeFalsy();
    expect(extractToolOutput(result)).toBe(
      "Event created successfully. Link: https://www.google.com/calendar/event?eid=evt-new-001",
    );
    expect(body).toEqual({
      summary: "Planning",
      description: "",
      start: { dateTime: "2026-03-10T10:00:00Z", timeZone: "UTC" },
      end: { dateTime: "2026-03-10T11:00:00Z", timeZone: "UTC" },
    });
  });

  it("should refuse an end before the start without calling Google", async () => {
    let called = false;
    server.use(
      http.post(EVENTS_URL, () => {
        called = true;
        return HttpResponse.json(createdEvent);
      }),
    );

    const result = await testClient.client.callTool({
      name: "create_event",
      arguments: { ...validArgs, end_time: "2026-03-10T09:00:00Z" },
    });

    expect(result.isError).toBe(true);
    expect(extractToolOutput(result)).toBe(
      "Failed to create event: Invalid parameters: end_time must be after start_time",
    );
    expect(called).toBe(false);
  });

  it("should refuse an unparsable start time", async () => {
    const result = await testClient.client.callTool({
      name: "create_event",
      arguments: { ...validArgs, start_time: "tomorrow at ten" },
    });

    expect(result.isError).toBe(true);
    expect(extractToolOutput(result)).toBe(
      "Failed to create event: Invalid parameters: start_time is not a valid ISO 8601 date-time: tomorrow at ten",
    );
  });

  it("should report missing write permission", async () => {
    server.use(
      http.post(EVENTS_URL, () =>
        HttpResponse.json(
          {
            error: {
              code: 403,
              message: "Request had insufficient authentication scopes.",
              errors: [{ reason: "insufficientPermissions" }],
            },
          },
          { status: 403 },
        ),
      ),
    );

    const result = await testClient.client.callTool({ name: "create_event", arguments: validArgs });

    expect(result.isError).toBe(true);
    expect(extractToolOutput(result)).toBe(
      "Failed to create event: Permission denied: Request had insufficient authentication scopes.",
    );
  });
});
