import { createHash, randomBytes } from "node:crypto";
import {
  InvalidGrantError,
  InvalidRequestError,
  InvalidTokenError,
} from "@modelcontextprotocol/sdk/server/auth/errors.js";
import type {
  AuthorizationParams,
  OAuthServerProvider,
} from "@modelcontextprotocol/sdk/server/auth/provider.js";
import type { AuthInfo } from "@modelcontextprotocol/sdk/server/auth/types.js";
import type {
  OAuthClientInformationFull,
  OAuthTokenRevocationRequest,
  OAuthTokens,
} from "@modelcontextprotocol/sdk/shared/auth.js";
import type { Response } from "express";
import { CodeChallengeMethod, type Credentials, OAuth2Client } from "google-auth-library";
import type { Config } from "../config.js";
import type { KeyValueStore } from "../storage/types.js";
import { createLogger } from "../utils/logger.js";
import { isRecordObject } from "../utils/type-guards.js";
import { StoredClientsStore } from "./clients-store.js";

const logger = createLogger("google-provider");

export const CALLBACK_PATH = "/auth/callback";

const TRANSACTIONS_COLLECTION = "oauth-transactions";
const CODES_COLLECTION = "oauth-codes";
const ACCESS_TOKENS_COLLECTION = "oauth-access-tokens";
const VERIFIED_TOKENS_COLLECTION = "oauth-verified-tokens";

const TRANSACTION_TTL_SECONDS = 600;
const CODE_TTL_SECONDS = 300;
const VERIFY_CACHE_MAX_SECONDS = 60;
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

/** Pending authorization: one per redirect to Google. */
interface AuthTransaction {
  clientId: string;
  redirectUri: string;
  clientState?: string;
  codeChallenge: string;
  scopes: string[];
  upstreamVerifier: string;
}

/** One-time code handed back to the MCP client after Google's callback. */
interface IssuedCode {
  clientId: string;
  redirectUri: string;
  codeChallenge: string;
  tokens: OAuthTokens;
}

interface VerifiedToken {
  clientId: string;
  scopes: string[];
  expiresAt: number;
  email?: string;
  sub?: string;
}

export interface CallbackQuery {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}

export type CallbackResult =
  | { status: 302; location: string }
  | { status: 400; message: string };

export function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

function buildRedirect(base: string, params: Record<string, string | undefined>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, value);
  }
  return url.toString();
}

/** Google answers token errors as `{ error: "invalid_grant", error_description }`. */
function isInvalidGrant(error: unknown): boolean {
  if (!isRecordObject(error) || !isRecordObject(error.response)) return false;
  const data = error.response.data;
  return isRecordObject(data) && data.error === "invalid_grant";
}

function toOAuthTokens(credentials: Credentials, fallbackRefreshToken?: string): OAuthTokens {
  if (!credentials.access_token) {
    throw new InvalidGrantError("Google returned no access token");
  }
  const expiresIn = credentials.expiry_date
    ? Math.max(0, Math.floor((credentials.expiry_date - Date.now()) / 1000))
    : DEFAULT_TOKEN_LIFETIME_SECONDS;
  const refreshToken = credentials.refresh_token ?? fallbackRefreshToken;
  const tokens: OAuthTokens = {
    access_token: credentials.access_token,
    token_type: "Bearer",
    expires_in: expiresIn,
  };
  if (refreshToken) tokens.refresh_token = refreshToken;
  if (credentials.scope) tokens.scope = credentials.scope;
  return tokens;
}

/**
 * OAuth proxy in front of Google.
 *
 * MCP clients register and authorize against this server; the user is sent
 * to Google with the server's own client credentials and the resulting Google
 * tokens are handed to the client. All intermediate state lives in the
 * shared {@link KeyValueStore} so any instance can complete a flow another
 * instance started.
 */
export class GoogleOAuthProvider implements OAuthServerProvider {
  readonly clientsStore: StoredClientsStore;
  readonly scopes: string[];
  private readonly store: KeyValueStore;
  private readonly config: Config;

  constructor(config: Config, store: KeyValueStore) {
    this.config = config;
    this.store = store;
    this.scopes = config.auth.requiredScopes;
    this.clientsStore = new StoredClientsStore(store, config.auth.allowedRedirectUris);
  }

  get callbackUrl(): string {
    return new URL(CALLBACK_PATH, this.config.server.url).toString();
  }

  /** Fresh Google client bound to the server's credentials. */
  createGoogleClient(): OAuth2Client {
    return new OAuth2Client({
      clientId: this.config.google.clientId,
      clientSecret: this.config.google.clientSecret,
      redirectUri: this.callbackUrl,
    });
  }

  async authorize(
    client: OAuthClientInformationFull,
    params: AuthorizationParams,
    res: Response,
  ): Promise<void> {
    const google = this.createGoogleClient();
    const { codeVerifier, codeChallenge } = await google.generateCodeVerifierAsync();
    const transactionId = randomBytes(24).toString("base64url");
    const scopes = [...new Set([...this.scopes, ...(params.scopes ?? [])])];

    const transaction: AuthTransaction = {
      clientId: client.client_id,
      redirectUri: params.redirectUri,
      clientState: params.state,
      codeChallenge: params.codeChallenge,
      scopes,
      upstreamVerifier: codeVerifier,
    };
    await this.store.put(TRANSACTIONS_COLLECTION, transactionId, transaction, {
      ttlSeconds: TRANSACTION_TTL_SECONDS,
    });

    const authUrl = google.generateAuthUrl({
      access_type: "offline",
      prompt: "consent",
      scope: scopes,
      state: transactionId,
      code_challenge: codeChallenge,
      code_challenge_method: CodeChallengeMethod.S256,
    });

    logger.info({ clientId: client.client_id }, "Redirecting to Google authorization");
    res.redirect(302, authUrl);
  }

  /**
   * Completes the upstream leg: exchanges Google's code and redirects the
   * user back to the MCP client with a one-time proxy code.
   */
  async handleCallback(query: CallbackQuery): Promise<CallbackResult> {
    if (!query.state) {
      return { status: 400, message: "Missing state parameter." };
    }
    const transaction = await this.store.take<AuthTransaction>(TRANSACTIONS_COLLECTION, query.state);
    if (!transaction) {
      return { status: 400, message: "Unknown or expired authorization transaction." };
    }

    if (query.error || !query.code) {
      logger.warn({ clientId: transaction.clientId, error: query.error }, "Google authorization failed");
      return {
        status: 302,
        location: buildRedirect(transaction.redirectUri, {
          error: query.error ?? "server_error",
          error_description: query.error_description,
          state: transaction.clientState,
        }),
      };
    }

    const google = this.createGoogleClient();
    let tokens: Credentials;
    try {
      ({ tokens } = await google.getToken({
        code: query.code,
        codeVerifier: transaction.upstreamVerifier,
        redirect_uri: this.callbackUrl,
      }));
    } catch (error) {
      logger.error({ clientId: transaction.clientId, error }, "Google code exchange failed");
      return {
        status: 302,
        location: buildRedirect(transaction.redirectUri, {
          error: "server_error",
          error_description: "Failed to exchange authorization code with Google",
          state: transaction.clientState,
        }),
      };
    }

    const proxyCode = randomBytes(32).toString("base64url");
    const issued: IssuedCode = {
      clientId: transaction.clientId,
      redirectUri: transaction.redirectUri,
      codeChallenge: transaction.codeChallenge,
      tokens: toOAuthTokens(tokens),
    };
    await this.store.put(CODES_COLLECTION, proxyCode, issued, { ttlSeconds: CODE_TTL_SECONDS });

    logger.info({ clientId: transaction.clientId }, "Google authorization completed");
    return {
      status: 302,
      location: buildRedirect(transaction.redirectUri, {
        code: proxyCode,
        state: transaction.clientState,
      }),
    };
  }

  async challengeForAuthorizationCode(
    client: OAuthClientInformationFull,
    authorizationCode: string,
  ): Promise<string> {
    const issued = await this.store.get<IssuedCode>(CODES_COLLECTION, authorizationCode);
    if (!issued || issued.clientId !== client.client_id) {
      throw new InvalidGrantError("Invalid authorization code");
    }
    return issued.codeChallenge;
  }

  async exchangeAuthorizationCode(
    client: OAuthClientInformationFull,
    authorizationCode: string,
    _codeVerifier?: string,
    redirectUri?: string,
  ): Promise<OAuthTokens> {
    const issued = await this.store.take<IssuedCode>(CODES_COLLECTION, authorizationCode);
    if (!issued) {
      throw new InvalidGrantError("Invalid authorization code");
    }

    if (issued.clientId !== client.client_id) {
      throw new InvalidGrantError("Authorization code was not issued to this client");
    }
    if (redirectUri !== undefined && redirectUri !== issued.redirectUri) {
      throw new InvalidGrantError("redirect_uri does not match the authorization request");
    }

    await this.recordAccessToken(issued.tokens, client.client_id);
    logger.info({ clientId: client.client_id }, "Authorization code exchanged");
    return issued.tokens;
  }

  async exchangeRefreshToken(
    client: OAuthClientInformationFull,
    refreshToken: string,
  ): Promise<OAuthTokens> {
    const google = this.createGoogleClient();
    google.setCredentials({ refresh_token: refreshToken });
    try {
      await google.getAccessToken();
    } catch (error) {
      if (isInvalidGrant(error)) {
        throw new InvalidGrantError("Refresh token is invalid or revoked");
      }
      throw error;
    }

    const tokens = toOAuthTokens(google.credentials, refreshToken);
    await this.recordAccessToken(tokens, client.client_id);
    logger.info({ clientId: client.client_id }, "Access token refreshed");
    return tokens;
  }

  async verifyAccessToken(token: string): Promise<AuthInfo> {
    const tokenHash = hashToken(token);
    const cached = await this.store.get<VerifiedToken>(VERIFIED_TOKENS_COLLECTION, tokenHash);
    if (cached) {
      return this.toAuthInfo(token, cached);
    }

    const google = this.createGoogleClient();
    let info: Awaited<ReturnType<OAuth2Client["getTokenInfo"]>>;
    try {
      info = await google.getTokenInfo(token);
    } catch (error) {
      logger.debug({ error }, "Token info lookup failed");
      throw new InvalidTokenError("Invalid or expired access token");
    }

    if (info.aud !== this.config.google.clientId) {
      logger.warn({ aud: info.aud }, "Token audience mismatch");
      throw new InvalidTokenError("Token was not issued for this server");
    }

    const mappedClientId = await this.store.get<string>(ACCESS_TOKENS_COLLECTION, tokenHash);
    const verified: VerifiedToken = {
      clientId: mappedClientId ?? info.azp ?? info.aud,
      scopes: info.scopes,
      expiresAt: Math.floor(info.expiry_date / 1000),
      email: info.email,
      sub: info.sub,
    };

    const remaining = verified.expiresAt - Math.floor(Date.now() / 1000);
    if (remaining > 0) {
      await this.store.put(VERIFIED_TOKENS_COLLECTION, tokenHash, verified, {
        ttlSeconds: Math.min(VERIFY_CACHE_MAX_SECONDS, remaining),
      });
    }
    return this.toAuthInfo(token, verified);
  }

  async revokeToken(
    client: OAuthClientInformationFull,
    request: OAuthTokenRevocationRequest,
  ): Promise<void> {
    if (!request.token) {
      throw new InvalidRequestError("token is required");
    }
    const google = this.createGoogleClient();
    await google.revokeToken(request.token);

    const tokenHash = hashToken(request.token);
    await this.store.delete(ACCESS_TOKENS_COLLECTION, tokenHash);
    await this.store.delete(VERIFIED_TOKENS_COLLECTION, tokenHash);
    logger.info({ clientId: client.client_id }, "Token revoked");
  }

  private async recordAccessToken(tokens: OAuthTokens, clientId: string): Promise<void> {
    await this.store.put(ACCESS_TOKENS_COLLECTION, hashToken(tokens.access_token), clientId, {
      ttlSeconds: tokens.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS,
    });
  }

  private toAuthInfo(token: string, verified: VerifiedToken): AuthInfo {
    return {
      token,
      clientId: verified.clientId,
      scopes: verified.scopes,
      expiresAt: verified.expiresAt,
      extra: { email: verified.email, sub: verified.sub },
    };
  }
}
