import type { OAuthClientProvider } from "@modelcontextprotocol/sdk/client/auth.js";
import type {
  OAuthClientInformation,
  OAuthClientInformationFull,
  OAuthClientMetadata,
  OAuthTokens,
} from "@modelcontextprotocol/sdk/shared/auth.js";
import type { KeyValueStore } from "../storage/types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("client-oauth");

const CLIENT_INFO_COLLECTION = "client-info";
const TOKENS_COLLECTION = "tokens";
const VERIFIER_COLLECTION = "code-verifier";

export interface FileOAuthClientProviderOptions {
  /** MCP server URL; entries are keyed by it so one profile can hold several servers. */
  serverUrl: string;
  redirectUrl: string;
  clientName?: string;
  /** Called with the authorization URL the user must open. */
  onRedirect?: (authorizationUrl: URL) => void;
}

/**
 * OAuth client state for the chat client, persisted in a {@link KeyValueStore}
 * (a DiskStore per profile) so logins survive restarts.
 */
export class FileOAuthClientProvider implements OAuthClientProvider {
  private readonly store: KeyValueStore;
  private readonly options: FileOAuthClientProviderOptions;

  constructor(store: KeyValueStore, options: FileOAuthClientProviderOptions) {
    this.store = store;
    this.options = options;
  }

  get redirectUrl(): string {
    return this.options.redirectUrl;
  }

  get clientMetadata(): OAuthClientMetadata {
    return {
      client_name: this.options.clientName ?? "gcal-mcp chat client",
      redirect_uris: [this.options.redirectUrl],
      grant_types: ["authorization_code", "refresh_token"],
      response_types: ["code"],
      token_endpoint_auth_method: "client_secret_post",
    };
  }

  private get key(): string {
    return this.options.serverUrl;
  }

  async clientInformation(): Promise<OAuthClientInformation | undefined> {
    return this.store.get<OAuthClientInformationFull>(CLIENT_INFO_COLLECTION, this.key);
  }

  async saveClientInformation(clientInformation: OAuthClientInformationFull): Promise<void> {
    await this.store.put(CLIENT_INFO_COLLECTION, this.key, clientInformation);
    logger.debug({ clientId: clientInformation.client_id }, "Client registration saved");
  }

  async tokens(): Promise<OAuthTokens | undefined> {
    return this.store.get<OAuthTokens>(TOKENS_COLLECTION, this.key);
  }

  async saveTokens(tokens: OAuthTokens): Promise<void> {
    await this.store.put(TOKENS_COLLECTION, this.key, tokens);
    logger.debug("Tokens saved");
  }

  redirectToAuthorization(authorizationUrl: URL): void {
    if (this.options.onRedirect) {
      this.options.onRedirect(authorizationUrl);
      return;
    }
    console.log(`\nOpen this URL in your browser to authorize:\n\n${authorizationUrl.toString()}\n`);
  }

  async saveCodeVerifier(codeVerifier: string): Promise<void> {
    await this.store.put(VERIFIER_COLLECTION, this.key, codeVerifier);
  }

  async codeVerifier(): Promise<string> {
    const verifier = await this.store.get<string>(VERIFIER_COLLECTION, this.key);
    if (!verifier) {
      throw new Error("No code verifier saved for this authorization");
    }
    return verifier;
  }

  async invalidateCredentials(scope: "all" | "client" | "tokens" | "verifier"): Promise<void> {
    if (scope === "all" || scope === "client") {
      await this.store.delete(CLIENT_INFO_COLLECTION, this.key);
    }
    if (scope === "all" || scope === "tokens") {
      await this.store.delete(TOKENS_COLLECTION, this.key);
    }
    if (scope === "all" || scope === "verifier") {
      await this.store.delete(VERIFIER_COLLECTION, this.key);
    }
    logger.debug({ scope }, "Credentials invalidated");
  }
}
