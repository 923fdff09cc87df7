import type { Role, SessionId, UserId } from "../utils/types.js";

/** What the identity provider hands back on login and refresh. */
export interface TokenGrant {
  readonly accessToken: string;
  readonly identityToken: string;
  /** Omitted when the provider does not rotate refresh tokens. */
  readonly refreshToken?: string;
  /** Lifetime of the access token in seconds. */
  readonly expiresIn: number;
}

export interface IdentityProvider {
  authenticate(username: string, password: string, signal?: AbortSignal): Promise<TokenGrant>;
  refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenGrant>;
  revoke(refreshToken: string, signal?: AbortSignal): Promise<void>;
}

/**
 * The live login of one user. Owned by the UI-side session layer; token
 * fields are replaced in place on refresh and wiped when the session ends.
 */
export interface Session {
  readonly id: SessionId;
  readonly userId: UserId;
  displayName: string;
  email: string;
  role: Role;
  accessToken: string;
  identityToken: string;
  refreshToken: string;
  /** Epoch ms. */
  issuedAt: number;
  /** Epoch ms. */
  expiresAt: number;
}

export interface VerifiedIdentity {
  readonly userId: UserId;
  readonly role: Role;
  /** Epoch ms at which the access token stops being valid. */
  readonly expiresAt: number;
}
