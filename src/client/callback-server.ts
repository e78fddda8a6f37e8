import { createServer } from "node:http";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("oauth-callback");

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

export interface CallbackServerOptions {
  path?: string;
  host?: string;
  timeoutMs?: number;
}

/**
 * Listens once on `http://<host>:<port><path>` for the OAuth redirect and
 * resolves with its `code`. Rejects when the redirect carries an `error`
 * or nothing arrives before the timeout.
 */
export function waitForAuthorizationCode(
  port: number,
  options: CallbackServerOptions = {},
): Promise<string> {
  const path = options.path ?? "/callback";
  const host = options.host ?? "127.0.0.1";
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const server = createServer((req, res) => {
      const url = new URL(req.url ?? "/", `http://${host}:${port}`);
      if (url.pathname !== path) {
        res.writeHead(404, { Connection: "close" }).end();
        return;
      }

      const code = url.searchParams.get("code");
      const error = url.searchParams.get("error");
      if (code) {
        res.writeHead(200, { "Content-Type": "text/plain", Connection: "close" });
        res.end("Authorization complete. You can close this window.");
        finish(() => resolve(code));
        return;
      }

      const description = url.searchParams.get("error_description");
      res.writeHead(400, { "Content-Type": "text/plain", Connection: "close" });
      res.end(`Authorization failed: ${error ?? "missing code"}`);
      finish(() =>
        reject(
          new Error(`Authorization failed: ${error ?? "missing code"}${description ? ` (${description})` : ""}`),
        ),
      );
    });

    const timer = setTimeout(() => {
      finish(() => reject(new Error("Timed out waiting for authorization")));
    }, timeoutMs);

    function finish(settle: () => void): void {
      clearTimeout(timer);
      server.close();
      settle();
    }

    server.on("error", (error) => {
      finish(() => reject(error));
    });
    server.listen(port, host, () => {
      logger.debug({ port, path }, "Waiting for OAuth redirect");
    });
  });
}
