import { randomUUID } from "node:crypto";
import type { OAuthRegisteredClientsStore } from "@modelcontextprotocol/sdk/server/auth/clients.js";
import { InvalidClientMetadataError } from "@modelcontextprotocol/sdk/server/auth/errors.js";
import type { OAuthClientInformationFull } from "@modelcontextprotocol/sdk/shared/auth.js";
import type { KeyValueStore } from "../storage/types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("oauth-clients");

export const CLIENTS_COLLECTION = "oauth-clients";

/** Registration payload as handed over by the SDK's /register handler. */
export type ClientRegistration = Omit<OAuthClientInformationFull, "client_id" | "client_id_issued_at"> &
  Partial<Pick<OAuthClientInformationFull, "client_id" | "client_id_issued_at">>;

/**
 * Matches a redirect URI against an allow-list entry.
 * Entries ending in `*` match by prefix, all others must be equal.
 */
export function matchesRedirectPattern(uri: string, pattern: string): boolean {
  if (pattern.endsWith("*")) {
    return uri.startsWith(pattern.slice(0, -1));
  }
  return uri === pattern;
}

/**
 * Dynamic client registrations persisted in the shared store, so a client
 * registered on one instance is known to all of them.
 */
export class StoredClientsStore implements OAuthRegisteredClientsStore {
  private readonly store: KeyValueStore;
  private readonly allowedRedirectUris?: string[];

  constructor(store: KeyValueStore, allowedRedirectUris?: string[]) {
    this.store = store;
    this.allowedRedirectUris = allowedRedirectUris;
  }

  async getClient(clientId: string): Promise<OAuthClientInformationFull | undefined> {
    return this.store.get<OAuthClientInformationFull>(CLIENTS_COLLECTION, clientId);
  }

  async registerClient(client: ClientRegistration): Promise<OAuthClientInformationFull> {
    const allowed = this.allowedRedirectUris;
    if (allowed) {
      const rejected = client.redirect_uris.filter(
        (uri) => !allowed.some((pattern) => matchesRedirectPattern(uri, pattern)),
      );
      if (rejected.length > 0) {
        logger.warn({ rejected }, "Client registration rejected");
        throw new InvalidClientMetadataError(`Redirect URI not allowed: ${rejected.join(", ")}`);
      }
    }

    const full: OAuthClientInformationFull = {
      ...client,
      client_id: client.client_id ?? randomUUID(),
      client_id_issued_at: client.client_id_issued_at ?? Math.floor(Date.now() / 1000),
    };
    await this.store.put(CLIENTS_COLLECTION, full.client_id, full);
    logger.info(
      { clientId: full.client_id, clientName: full.client_name },
      "OAuth client registered",
    );
    return full;
  }
}
