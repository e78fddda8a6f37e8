import { http, HttpResponse } from "msw";
import { createCalendarServiceFactory, getCalendarService } from "../src/auth/calendar-client.js";
import { loadConfig } from "../src/config.js";
import { ToolError } from "../src/utils/errors.js";
import { CALENDAR_BASE } from "./mocks/handlers/calendar.js";
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

const config = loadConfig({
  GOOGLE_CLIENT_ID: "test-client-id",
  GOOGLE_CLIENT_SECRET: "test-secret",
});

const authInfo = {
  token: "test-user-token",
  clientId: "client-1",
  scopes: ["https://www.googleapis.com/auth/calendar.events"],
  expiresAt: Math.floor(Date.now() / 1000) + 3600,
};

describe("getCalendarService", () => {
  it("should fail without an authenticated user", () => {
    expect(() => getCalendarService(undefined, config)).toThrow(
      new ToolError("No active authentication found. Please log in."),
    );
  });

  it("should fail when the auth context has no token", () => {
    expect(() => getCalendarService({ ...authInfo, token: "" }, config)).toThrow(
      "Could not retrieve access token from user context.",
    );
  });

  it("should call the Calendar API with the user's bearer token", async () => {
    let authorization: string | null = null;
    server.use(
      http.get(`${CALENDAR_BASE}/calendars/primary/events`, ({ request }) => {
        authorization = request.headers.get("authorization");
        return HttpResponse.json({ items: [] });
      }),
    );

    const calendar = createCalendarServiceFactory(config)(authInfo);
    const response = await calendar.events.list({ calendarId: "primary" });

    expect(response.data.items).toEqual([]);
    expect(authorization).toBe("Bearer test-user-token");
  });
});
