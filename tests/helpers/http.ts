import type { Server } from "node:http";
import { type AddressInfo, createServer } from "node:net";
import type { Express } from "express";

function portOf(address: AddressInfo | string | null): number {
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return address.port;
}

export interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

/** Starts `app` on an ephemeral loopback port. */
export function listen(app: Express): Promise<RunningApp> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, "127.0.0.1", (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      const port = portOf(server.address());
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((closeError) => (closeError ? fail(closeError) : done()));
          }),
      });
    });
  });
}

/** Reserves a free loopback port and releases it again. */
export function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const candidate = createServer();
    candidate.once("error", reject);
    candidate.listen(0, "127.0.0.1", () => {
      const port = portOf(candidate.address());
      candidate.close(() => resolve(port));
    });
  });
}

/** Fetches `url`, retrying while nothing is listening on it yet. */
export async function fetchWhenListening(url: string, attempts = 40): Promise<Response> {
  let lastError: unknown;
  for (let i = 0; i < attempts; i++) {
    try {
      return await fetch(url);
    } catch (error) {
      lastError = error;
      await new Promise((resolve) => setTimeout(resolve, 25));
    }
  }
  throw lastError;
}
