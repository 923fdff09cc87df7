import { verify } from "hono/jwt";
import { AuthorizationError, TokenRejectedError } from "../errors.js";
import { UserId } from "../utils/types.js";
import { accessClaimsSchema } from "./claims.js";
import type { PropagationContext } from "./propagation.js";
import type { VerifiedIdentity } from "./types.js";

export interface TokenVerifierOptions {
  readonly secret: string;
  readonly issuer: string;
  /** Upper bound on how long a successful verification is reused. 0 disables caching. */
  readonly cacheTtlMs: number;
  /** Defaults to 1000. */
  readonly maxCacheEntries?: number;
  readonly clock?: () => number;
}

interface CachedVerification {
  readonly identity: VerifiedIdentity;
  readonly until: number;
}

const DEFAULT_MAX_CACHE_ENTRIES = 1_000;

/**
 * Checks access tokens against the issuing authority's key. Results are
 * cached for at most `cacheTtlMs` and never beyond the token's own expiry.
 */
export class TokenVerifier {
  private readonly cache = new Map<string, CachedVerification>();
  private readonly now: () => number;
  private readonly maxEntries: number;

  constructor(private readonly options: TokenVerifierOptions) {
    this.now = options.clock ?? Date.now;
    this.maxEntries = options.maxCacheEntries ?? DEFAULT_MAX_CACHE_ENTRIES;
  }

  async verify(token: string): Promise<VerifiedIdentity> {
    const now = this.now();
    const cached = this.cache.get(token);
    if (cached && cached.until > now) return cached.identity;
    if (cached) this.cache.delete(token);

    let payload: unknown;
    try {
      payload = await verify(token, this.options.secret, "HS256");
    } catch (err) {
      throw new TokenRejectedError("Access token failed verification", { cause: err });
    }

    const claims = accessClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new TokenRejectedError("Access token is not a valid access token");
    }
    if (claims.data.iss !== this.options.issuer) {
      throw new TokenRejectedError(`Access token issued by untrusted issuer ${claims.data.iss}`);
    }

    const identity: VerifiedIdentity = {
      userId: UserId.make(claims.data.sub),
      role: claims.data.role,
      expiresAt: claims.data.exp * 1000,
    };

    if (this.options.cacheTtlMs > 0) {
      if (this.cache.size >= this.maxEntries) this.prune(now);
      this.cache.set(token, {
        identity,
        until: Math.min(now + this.options.cacheTtlMs, identity.expiresAt),
      });
    }
    return identity;
  }

  /**
   * Verifies the context's token and checks that the declared user and role
   * are the ones the token asserts.
   */
  async verifyContext(context: PropagationContext): Promise<VerifiedIdentity> {
    const identity = await this.verify(context.accessToken);
    if (identity.userId !== context.userId) {
      throw new AuthorizationError("Declared user does not match the access token");
    }
    if (identity.role !== context.role) {
      throw new AuthorizationError(
        `Declared role '${context.role}' does not match the access token role '${identity.role}'`,
      );
    }
    return identity;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private prune(now: number): void {
    for (const [token, entry] of this.cache) {
      if (entry.until <= now) this.cache.delete(token);
    }
    // Still full of live entries: drop the oldest insertion.
    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
  }
}
