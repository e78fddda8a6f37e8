/**
 * Error class hierarchy for the calendar server.
 *
 * Google API failures (gaxios errors carrying `response.status`) are mapped
 * onto typed errors so tool handlers can render short user-facing messages.
 */

import { isRecordObject } from "./type-guards.js";

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

export class McpToolError extends Error {
  readonly code: string;
  readonly httpStatus?: number;
  readonly retryable: boolean;

  constructor(message: string, code: string, httpStatus?: number, retryable = false) {
    super(message);
    this.name = "McpToolError";
    this.code = code;
    this.httpStatus = httpStatus;
    this.retryable = retryable;
  }
}

// ---------------------------------------------------------------------------
// Tool error (request context / authorization plumbing)
// ---------------------------------------------------------------------------

export class ToolError extends McpToolError {
  constructor(message: string) {
    super(message, "TOOL_ERROR");
    this.name = "ToolError";
  }
}

// ---------------------------------------------------------------------------
// Calendar API error (generic wrapper for Google HTTP errors)
// ---------------------------------------------------------------------------

export class CalendarApiError extends McpToolError {
  readonly reason: string;

  constructor(message: string, httpStatus: number, reason: string, retryable = false) {
    super(message, "CALENDAR_API_ERROR", httpStatus, retryable);
    this.name = "CalendarApiError";
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Auth error (401 / 403)
// ---------------------------------------------------------------------------

export class AuthError extends McpToolError {
  constructor(message: string, httpStatus: number) {
    super(message, "AUTH_ERROR", httpStatus, false);
    this.name = "AuthError";
  }
}

// ---------------------------------------------------------------------------
// Validation error (400)
// ---------------------------------------------------------------------------

export class ValidationError extends McpToolError {
  readonly details: string;

  constructor(details: string) {
    super(`Validation failed: ${details}`, "VALIDATION_ERROR", 400, false);
    this.name = "ValidationError";
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Not found error (404)
// ---------------------------------------------------------------------------

export class NotFoundError extends McpToolError {
  readonly resource: string;

  constructor(resource: string) {
    super(`Resource not found: ${resource}`, "NOT_FOUND_ERROR", 404, false);
    this.name = "NotFoundError";
    this.resource = resource;
  }
}

// ---------------------------------------------------------------------------
// Rate limit error (429, or 403 with a rate-limit reason)
// ---------------------------------------------------------------------------

export class RateLimitError extends McpToolError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(
      `Rate limit exceeded. Retry after ${Math.ceil(retryAfterMs / 1000)}s`,
      "RATE_LIMIT_ERROR",
      429,
      true,
    );
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

// ---------------------------------------------------------------------------
// Service error (500-503, retryable)
// ---------------------------------------------------------------------------

export class ServiceError extends McpToolError {
  constructor(message: string, httpStatus: number) {
    super(message, "SERVICE_ERROR", httpStatus, true);
    this.name = "ServiceError";
  }
}

// ---------------------------------------------------------------------------
// Network error (ECONNREFUSED, ETIMEDOUT, etc.)
// ---------------------------------------------------------------------------

export class NetworkError extends McpToolError {
  readonly syscall?: string;

  constructor(message: string, syscall?: string) {
    super(message, "NETWORK_ERROR", undefined, true);
    this.name = "NetworkError";
    this.syscall = syscall;
  }
}

// ---------------------------------------------------------------------------
// Mapping from Google API failures
// ---------------------------------------------------------------------------

const NETWORK_CODES = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
];

const RATE_LIMIT_REASONS = ["rateLimitExceeded", "userRateLimitExceeded", "quotaExceeded"];

interface GoogleErrorDetails {
  status: number;
  message: string;
  reason: string;
  retryAfterMs: number;
}

/** Shape of the Google API JSON error body: `{ error: { code, message, errors: [{ reason }] } }`. */
function readErrorBody(data: unknown): { message?: string; reason?: string } {
  if (!isRecordObject(data) || !isRecordObject(data.error)) return {};
  const body = data.error;
  const message = typeof body.message === "string" ? body.message : undefined;
  let reason: string | undefined;
  if (Array.isArray(body.errors)) {
    const first: unknown = body.errors[0];
    if (isRecordObject(first) && typeof first.reason === "string") {
      reason = first.reason;
    }
  }
  return { message, reason };
}

function readRetryAfterMs(headers: unknown): number {
  if (!isRecordObject(headers)) return 1000;
  const raw = headers["retry-after"];
  if (typeof raw !== "string") return 1000;
  const seconds = Number(raw);
  return Number.isNaN(seconds) ? 1000 : seconds * 1000;
}

function readGoogleError(error: unknown): GoogleErrorDetails | undefined {
  if (!isRecordObject(error) || !isRecordObject(error.response)) return undefined;
  const response = error.response;
  if (typeof response.status !== "number") return undefined;
  const body = readErrorBody(response.data);
  const fallback = typeof error.message === "string" ? error.message : "Unknown error";
  return {
    status: response.status,
    message: body.message ?? fallback,
    reason: body.reason ?? "unknown",
    retryAfterMs: readRetryAfterMs(response.headers),
  };
}

function isNetworkError(error: unknown): error is Error & { code: string; syscall?: string } {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return typeof error.code === "string" && NETWORK_CODES.includes(error.code);
}

/**
 * Converts any failure raised by the Google client into the McpToolError hierarchy.
 * McpToolErrors pass through unchanged.
 */
export function mapCalendarError(error: unknown): McpToolError {
  if (error instanceof McpToolError) return error;

  if (isNetworkError(error)) {
    return new NetworkError(error.message, error.syscall);
  }

  const details = readGoogleError(error);
  if (!details) {
    const message = error instanceof Error ? error.message : String(error);
    return new McpToolError(message, "UNKNOWN_ERROR");
  }

  const { status, message, reason } = details;
  if (RATE_LIMIT_REASONS.includes(reason) && (status === 403 || status === 429)) {
    return new RateLimitError(details.retryAfterMs);
  }

  switch (status) {
    case 400:
      return new ValidationError(message);
    case 401:
    case 403:
      return new AuthError(message, status);
    case 404:
      return new NotFoundError(message);
    case 429:
      return new RateLimitError(details.retryAfterMs);
    default:
      if (status >= 500 && status <= 599) {
        return new ServiceError(message, status);
      }
      return new CalendarApiError(message, status, reason);
  }
}

// ---------------------------------------------------------------------------
// Helper: format error for user
// ---------------------------------------------------------------------------

export function formatErrorForUser(error: McpToolError): string {
  if (error instanceof ValidationError) {
    return `Invalid parameters: ${error.details}`;
  }

  if (error instanceof AuthError) {
    if (error.httpStatus === 403) {
      return `Permission denied: ${error.message}`;
    }
    return "Authentication expired. Please log in again.";
  }

  if (error instanceof NotFoundError) {
    return error.message;
  }

  if (error instanceof RateLimitError) {
    const seconds = Math.ceil(error.retryAfterMs / 1000);
    return `Rate limit reached. Try again in ${seconds} seconds.`;
  }

  if (error instanceof ServiceError) {
    return "Google Calendar API temporarily unavailable.";
  }

  if (error instanceof NetworkError) {
    return "No connection to Google Calendar. Check your network.";
  }

  return error.message;
}
