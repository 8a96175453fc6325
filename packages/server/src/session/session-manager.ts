/**
 * Session manager
 *
 * Supplies a ready-to-use token pair:
 * 1. Reuse the in-memory session, or the stored tokens (checked once with verify)
 * 2. Refresh an expired OAuth2 token on reuse (persisted when it changes)
 * 3. Otherwise log in with account credentials and persist the new tokens
 *
 * States: no-session -> [login] -> session-active -> [token rejected] -> no-session
 */

import { isAuthenticationError } from "../lib/errors.js";
import { setupLogger } from "../lib/logger.js";
import type {
  BodyCompositionApi,
  GarminCredentials,
  GarminTokens,
} from "../services/garmin-connect/types.js";
import type { TokenStore } from "./token-store.js";

const logger = setupLogger("session");

export type SessionSource = "memory" | "stored" | "login";

export interface Session {
  tokens: GarminTokens;
  source: SessionSource;
}

export interface GetSessionOptions {
  /** Skip cached tokens and log in */
  forceLogin?: boolean;
}

export interface SessionManagerOptions {
  api: BodyCompositionApi;
  store: TokenStore<GarminTokens>;
  credentials: GarminCredentials;
}

export class SessionManager {
  private readonly api: BodyCompositionApi;
  private readonly store: TokenStore<GarminTokens>;
  private readonly credentials: GarminCredentials;
  private current: GarminTokens | null = null;

  constructor(options: SessionManagerOptions) {
    this.api = options.api;
    this.store = options.store;
    this.credentials = options.credentials;
  }

  get isActive(): boolean {
    return this.current !== null;
  }

  /**
   * Drop the in-memory session. The token file is left in place and is
   * overwritten by the next successful login.
   */
  invalidate(): void {
    this.current = null;
  }

  async getSession(options: GetSessionOptions = {}): Promise<Session> {
    if (!options.forceLogin) {
      const reused = await this.reuse();
      if (reused) {
        return reused;
      }
    }
    return this.login();
  }

  private async reuse(): Promise<Session | null> {
    const source: SessionSource = this.current ? "memory" : "stored";
    const candidate = this.current ?? (await this.store.read());
    if (!candidate) {
      return null;
    }

    try {
      const { tokens, refreshed } = await this.api.refresh(candidate);
      if (source === "stored") {
        await this.api.verify(tokens);
      }
      if (refreshed) {
        await this.store.write(tokens);
      }
      if (source === "stored") {
        logger.info("Resumed session from stored tokens");
      }
      this.current = tokens;
      return { tokens, source };
    } catch (error) {
      if (!isAuthenticationError(error)) {
        throw error;
      }
      logger.warn(`Cached session rejected: ${error.message}`);
      this.current = null;
      return null;
    }
  }

  private async login(): Promise<Session> {
    this.current = null;
    logger.info("Authenticating with credentials...");
    const tokens = await this.api.login(this.credentials);
    await this.store.write(tokens);
    this.current = tokens;
    return { tokens, source: "login" };
  }
}
