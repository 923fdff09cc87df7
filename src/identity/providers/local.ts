import { randomBytes, randomUUID, timingSafeEqual } from "node:crypto";
import { sign } from "hono/jwt";
import type { DirectoryUserConfig } from "../../config/types.js";
import { IdentityProviderError } from "../../errors.js";
import { ROLE_CLAIM } from "../claims.js";
import type { IdentityProvider, TokenGrant } from "../types.js";

export interface LocalIdentityOptions {
  readonly issuer: string;
  readonly secret: string;
  readonly accessTokenTtlSec: number;
  readonly refreshTokenTtlSec: number;
  readonly users: readonly DirectoryUserConfig[];
  readonly clock?: () => number;
}

interface RefreshRecord {
  readonly username: string;
  readonly expiresAt: number;
}

function sameSecret(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * In-process identity provider backed by the configured user directory.
 * Issues HS256 access and identity tokens and opaque, rotating refresh tokens.
 */
export class LocalIdentityProvider implements IdentityProvider {
  private readonly refreshTokens = new Map<string, RefreshRecord>();
  private readonly now: () => number;

  constructor(private readonly options: LocalIdentityOptions) {
    this.now = options.clock ?? Date.now;
  }

  async authenticate(username: string, password: string): Promise<TokenGrant> {
    const user = this.options.users.find((u) => u.username === username);
    if (!user || !sameSecret(user.password, password)) {
      throw new IdentityProviderError("rejected", "Incorrect username or password");
    }
    return this.issue(user, this.mintRefreshToken(user.username));
  }

  async refresh(refreshToken: string): Promise<TokenGrant> {
    const record = this.refreshTokens.get(refreshToken);
    this.refreshTokens.delete(refreshToken);
    if (!record || record.expiresAt <= this.now()) {
      throw new IdentityProviderError("rejected", "Refresh token is invalid or expired");
    }
    const user = this.options.users.find((u) => u.username === record.username);
    if (!user) {
      throw new IdentityProviderError("rejected", "User no longer exists");
    }
    return this.issue(user, this.mintRefreshToken(user.username));
  }

  async revoke(refreshToken: string): Promise<void> {
    this.refreshTokens.delete(refreshToken);
  }

  /** Revokes every refresh token held by `username`. */
  revokeUser(username: string): number {
    let revoked = 0;
    for (const [token, record] of this.refreshTokens) {
      if (record.username === username) {
        this.refreshTokens.delete(token);
        revoked++;
      }
    }
    return revoked;
  }

  get activeRefreshTokens(): number {
    return this.refreshTokens.size;
  }

  private mintRefreshToken(username: string): string {
    const token = randomBytes(32).toString("base64url");
    this.refreshTokens.set(token, {
      username,
      expiresAt: this.now() + this.options.refreshTokenTtlSec * 1000,
    });
    return token;
  }

  private async issue(user: DirectoryUserConfig, refreshToken: string): Promise<TokenGrant> {
    const iat = Math.floor(this.now() / 1000);
    const exp = iat + this.options.accessTokenTtlSec;
    const { issuer, secret } = this.options;

    const accessToken = await sign(
      { sub: user.username, role: user.role, token_use: "access", iss: issuer, iat, exp, jti: randomUUID() },
      secret,
      "HS256",
    );
    const identityToken = await sign(
      {
        sub: user.username,
        name: user.name,
        email: user.email,
        [ROLE_CLAIM]: user.role,
        token_use: "id",
        iss: issuer,
        iat,
        exp,
      },
      secret,
      "HS256",
    );

    return { accessToken, identityToken, refreshToken, expiresIn: this.options.accessTokenTtlSec };
  }
}
