import { sign } from "hono/jwt";
import pino from "pino";
import { vi, type Mock } from "vitest";
import { parseConfig } from "../../src/config/schema.js";
import type { AnalyticsConfig, DirectoryUserConfig } from "../../src/config/types.js";
import { ROLE_CLAIM } from "../../src/identity/claims.js";
import type { PropagationContext } from "../../src/identity/propagation.js";
import type { IdentityProvider, Session, TokenGrant } from "../../src/identity/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { ServiceApp } from "../../src/stack/factory.js";
import type { FetchFn } from "../../src/utils/http.js";
import { RequestId, SessionId, UserId } from "../../src/utils/types.js";

export const TEST_SECRET = "test-secret-signing-key";
export const TEST_ISSUER = "test-issuer";
export const TEST_INTERNAL_KEY = "test-internal-key";

export const TEST_USERS: DirectoryUserConfig[] = [
  {
    username: "analyst@example.com",
    password: "analyst-pass",
    name: "Ana Analyst",
    email: "analyst@example.com",
    role: "analyst",
  },
  {
    username: "manager@example.com",
    password: "manager-pass",
    name: "Max Manager",
    email: "manager@example.com",
    role: "manager",
  },
];

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** Config for an in-process stack; hostnames keep the hops apart. */
export function makeConfig(overrides: Record<string, unknown> = {}): AnalyticsConfig {
  return parseConfig({
    identity: {
      url: "http://identity.test",
      issuer: TEST_ISSUER,
      signingSecret: TEST_SECRET,
      users: TEST_USERS,
    },
    session: { refreshBaseDelayMs: 1 },
    runtime: { url: "http://runtime.test" },
    gateway: { url: "http://gateway.test" },
    executor: { url: "http://executor.test", internalKey: TEST_INTERNAL_KEY },
    logging: { level: "silent" },
    ...overrides,
  });
}

export function fetchVia(app: ServiceApp): FetchFn {
  return async (input, init) => app.fetch(new Request(input, init));
}

export interface GrantClaims {
  readonly sub?: string;
  readonly role?: string;
  readonly name?: string;
  readonly expiresIn?: number;
  readonly issuer?: string;
  readonly refreshToken?: string;
}

let grantCounter = 0;

/** A grant signed with TEST_SECRET, as LocalIdentityProvider would issue it. */
export async function makeGrant(claims: GrantClaims = {}): Promise<TokenGrant> {
  const sub = claims.sub ?? "analyst@example.com";
  const role = claims.role ?? "analyst";
  const expiresIn = claims.expiresIn ?? 3600;
  const iat = Math.floor(Date.now() / 1000);
  const iss = claims.issuer ?? TEST_ISSUER;
  grantCounter++;

  return {
    accessToken: await sign(
      { sub, role, token_use: "access", iss, iat, exp: iat + expiresIn, jti: `jti-${grantCounter}` },
      TEST_SECRET,
      "HS256",
    ),
    identityToken: await sign(
      { sub, name: claims.name ?? "Ana Analyst", email: sub, [ROLE_CLAIM]: role, token_use: "id", iss, iat, exp: iat + expiresIn },
      TEST_SECRET,
      "HS256",
    ),
    refreshToken: claims.refreshToken ?? `refresh-${grantCounter}`,
    expiresIn,
  };
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: SessionId.make("session-1"),
    userId: UserId.make("analyst@example.com"),
    displayName: "Ana Analyst",
    email: "analyst@example.com",
    role: "analyst",
    accessToken: "access-token",
    identityToken: "identity-token",
    refreshToken: "refresh-token",
    issuedAt: 0,
    expiresAt: 3_600_000,
    ...overrides,
  };
}

export function mockProvider(): {
  provider: IdentityProvider;
  authenticate: Mock<IdentityProvider["authenticate"]>;
  refresh: Mock<IdentityProvider["refresh"]>;
  revoke: Mock<IdentityProvider["revoke"]>;
} {
  const authenticate = vi.fn<IdentityProvider["authenticate"]>();
  const refresh = vi.fn<IdentityProvider["refresh"]>();
  const revoke = vi.fn<IdentityProvider["revoke"]>().mockResolvedValue(undefined);
  return { provider: { authenticate, refresh, revoke }, authenticate, refresh, revoke };
}

export function makeContext(overrides: Partial<PropagationContext> = {}): PropagationContext {
  return {
    accessToken: "access-token",
    role: "analyst",
    userId: UserId.make("analyst@example.com"),
    requestId: RequestId.make("req-1"),
    ...overrides,
  };
}

/** A context whose access token is really signed for `role`. */
export async function signedContext(role: "analyst" | "manager", declaredRole: string = role): Promise<PropagationContext> {
  const sub = `${role}@example.com`;
  const grant = await makeGrant({ sub, role });
  return makeContext({ accessToken: grant.accessToken, role: declaredRole, userId: UserId.make(sub) });
}

/** NDJSON body that emits `lines` and then stays open unless `close` is set. */
export function ndjsonBody(lines: readonly string[], options: { close?: boolean; onCancel?: () => void } = {}): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const line of lines) controller.enqueue(encoder.encode(line));
      if (options.close ?? true) controller.close();
    },
    cancel() {
      options.onCancel?.();
    },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}
