import { randomUUID } from "node:crypto";
import {
  AuthenticationError,
  IdentityProviderError,
  OperationTimeoutError,
  RefreshError,
  SessionExpiredError,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { retry } from "../utils/retry.js";
import { SingleFlight } from "../utils/single-flight.js";
import { withTimeout } from "../utils/timeout.js";
import { SessionId, UserId } from "../utils/types.js";
import { readIdentityClaims } from "./claims.js";
import type { CredentialStore } from "./credential-store.js";
import type { IdentityProvider, Session, TokenGrant } from "./types.js";

export interface TokenManagerOptions {
  /** Renew this long before the access token actually expires. */
  readonly renewalMarginMs: number;
  readonly refreshMaxAttempts: number;
  readonly refreshBaseDelayMs?: number;
  readonly loginTimeoutMs: number;
  readonly refreshTimeoutMs: number;
  readonly clock?: () => number;
}

function isTransient(err: unknown): boolean {
  if (err instanceof IdentityProviderError) return err.kind === "unavailable";
  return err instanceof OperationTimeoutError;
}

export class TokenLifecycleManager {
  private readonly refreshFlight = new SingleFlight<SessionId, void>();
  private readonly now: () => number;

  constructor(
    private readonly provider: IdentityProvider,
    private readonly store: CredentialStore,
    private readonly logger: Logger,
    private readonly options: TokenManagerOptions,
  ) {
    this.now = options.clock ?? Date.now;
  }

  async login(username: string, password: string): Promise<Session> {
    const issuedAt = this.now();

    let grant: TokenGrant;
    try {
      grant = await withTimeout("login", this.options.loginTimeoutMs, (signal) =>
        this.provider.authenticate(username, password, signal),
      );
    } catch (err) {
      if (err instanceof IdentityProviderError && err.kind === "rejected") {
        this.logger.info({ username }, "Login rejected");
        throw new AuthenticationError(undefined, { cause: err });
      }
      throw err;
    }

    if (!grant.refreshToken) {
      throw new IdentityProviderError("rejected", "Identity provider issued no refresh token");
    }

    const claims = readIdentityClaims(grant.identityToken);
    const session: Session = {
      id: SessionId.make(randomUUID()),
      userId: UserId.make(claims.sub),
      displayName: claims.name ?? username,
      email: claims.email ?? username,
      role: claims.role,
      accessToken: grant.accessToken,
      identityToken: grant.identityToken,
      refreshToken: grant.refreshToken,
      issuedAt,
      expiresAt: issuedAt + grant.expiresIn * 1000,
    };

    this.store.set(session);
    this.logger.info(
      { userId: session.userId, role: session.role, expiresAt: new Date(session.expiresAt).toISOString() },
      "User logged in",
    );
    return session;
  }

  /**
   * Returns an access token that is valid for at least the renewal margin.
   * Refreshes when inside the margin; any refresh outcome other than success
   * ends the session.
   */
  async ensureValid(session: Session): Promise<string> {
    if (!this.store.isLive(session)) {
      throw new SessionExpiredError("Session is no longer active; please log in again");
    }

    if (this.now() < session.expiresAt - this.options.renewalMarginMs) {
      return session.accessToken;
    }

    try {
      await this.refresh(session);
    } catch (err) {
      if (err instanceof SessionExpiredError) throw err;
      this.expire(session, "refresh failed after retries");
      throw new SessionExpiredError(undefined, { cause: err });
    }

    return session.accessToken;
  }

  /**
   * Exchanges the refresh token for new tokens. Concurrent callers for the
   * same session share a single provider round trip.
   */
  refresh(session: Session): Promise<void> {
    return this.refreshFlight.run(session.id, () => this.performRefresh(session));
  }

  /** Ends the session locally, then revokes upstream on a best-effort basis. */
  async logout(session: Session): Promise<void> {
    const refreshToken = session.refreshToken;
    this.expire(session, "logout");
    if (!refreshToken) return;

    try {
      await withTimeout("revoke", this.options.refreshTimeoutMs, (signal) =>
        this.provider.revoke(refreshToken, signal),
      );
    } catch (err) {
      this.logger.warn({ err, userId: session.userId }, "Refresh token revocation failed");
    }
  }

  private async performRefresh(session: Session): Promise<void> {
    const refreshToken = session.refreshToken;

    let grant: TokenGrant;
    try {
      grant = await retry(
        () =>
          withTimeout("refresh", this.options.refreshTimeoutMs, (signal) =>
            this.provider.refresh(refreshToken, signal),
          ),
        {
          maxAttempts: this.options.refreshMaxAttempts,
          baseDelayMs: this.options.refreshBaseDelayMs,
          shouldRetry: isTransient,
          onRetry: (err, attempt, delayMs) =>
            this.logger.warn(
              { err, userId: session.userId, attempt, delayMs: Math.round(delayMs) },
              "Token refresh failed, retrying",
            ),
        },
      );
    } catch (err) {
      if (err instanceof IdentityProviderError && err.kind === "rejected") {
        this.expire(session, "refresh token rejected");
        throw new SessionExpiredError(undefined, { cause: err });
      }
      throw new RefreshError(undefined, { cause: err });
    }

    // Logged out while the refresh was in flight: do not bring the session back.
    if (!this.store.isLive(session)) {
      throw new SessionExpiredError("Session ended during token refresh");
    }

    const claims = readIdentityClaims(grant.identityToken);
    const issuedAt = this.now();
    session.accessToken = grant.accessToken;
    session.identityToken = grant.identityToken;
    session.refreshToken = grant.refreshToken ?? refreshToken;
    session.role = claims.role;
    session.displayName = claims.name ?? session.displayName;
    session.issuedAt = issuedAt;
    session.expiresAt = issuedAt + grant.expiresIn * 1000;

    this.logger.info(
      { userId: session.userId, expiresAt: new Date(session.expiresAt).toISOString() },
      "Tokens refreshed",
    );
  }

  private expire(session: Session, reason: string): void {
    this.store.clear(session.id);
    session.accessToken = "";
    session.identityToken = "";
    session.refreshToken = "";
    session.expiresAt = 0;
    this.logger.info({ userId: session.userId, reason }, "Session cleared");
  }
}
