import type { AuthInfo } from "@modelcontextprotocol/sdk/server/auth/types.js";
import { type calendar_v3, google } from "googleapis";
import type { Config } from "../config.js";
import { ToolError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("calendar-client");

/** Builds a Calendar API client for the user behind a request. */
export type CalendarServiceFactory = (authInfo: AuthInfo | undefined) => calendar_v3.Calendar;

/**
 * Rebuilds Google credentials from the bearer token the transport verified
 * and returns a Calendar v3 client bound to them.
 *
 * The token is the user's Google access token (the OAuth proxy hands Google's
 * tokens straight to MCP clients), so no lookup is needed.
 */
export function getCalendarService(
  authInfo: AuthInfo | undefined,
  config: Config,
): calendar_v3.Calendar {
  if (!authInfo) {
    throw new ToolError("No active authentication found. Please log in.");
  }

  const accessToken = authInfo.token;
  if (!accessToken) {
    logger.error({ clientId: authInfo.clientId }, "Token extraction failed");
    throw new ToolError("Could not retrieve access token from user context.");
  }

  try {
    // No expiry_date: refreshing happens client-side through the proxy's token endpoint.
    const auth = new google.auth.OAuth2(config.google.clientId, config.google.clientSecret);
    auth.setCredentials({
      access_token: accessToken,
      scope: config.auth.requiredScopes.join(" "),
    });
    return google.calendar({ version: "v3", auth });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error }, "Authorization/Service construction failed");
    throw new ToolError(`System Authorization Failure: ${message}`);
  }
}

export function createCalendarServiceFactory(config: Config): CalendarServiceFactory {
  return (authInfo) => getCalendarService(authInfo, config);
}
