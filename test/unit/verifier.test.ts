import { describe, it, expect, vi, beforeEach } from "vitest";
import { verify } from "hono/jwt";
import { AuthorizationError, TokenRejectedError } from "../../src/errors.js";
import { buildContext } from "../../src/identity/propagation.js";
import { TokenVerifier } from "../../src/identity/verifier.js";
import { RequestId } from "../../src/utils/types.js";
import { TEST_ISSUER, TEST_SECRET, makeGrant, makeSession } from "../helpers/fixtures.js";

vi.mock("hono/jwt", async (importOriginal) => {
  const mod = await importOriginal<typeof import("hono/jwt")>();
  return { ...mod, verify: vi.fn(mod.verify) };
});

const verifySpy = vi.mocked(verify);

function makeVerifier(cacheTtlMs = 60_000, clock?: () => number): TokenVerifier {
  return new TokenVerifier({ secret: TEST_SECRET, issuer: TEST_ISSUER, cacheTtlMs, clock });
}

describe("TokenVerifier", () => {
  beforeEach(() => {
    verifySpy.mockClear();
  });

  it("returns the identity asserted by a valid access token", async () => {
    const grant = await makeGrant({ sub: "manager@example.com", role: "manager" });
    const identity = await makeVerifier().verify(grant.accessToken);

    expect(identity.userId).toBe("manager@example.com");
    expect(identity.role).toBe("manager");
    expect(identity.expiresAt).toBeGreaterThan(Date.now());
  });

  it("reuses a verification within the cache window", async () => {
    const grant = await makeGrant();
    const verifier = makeVerifier();

    await verifier.verify(grant.accessToken);
    await verifier.verify(grant.accessToken);

    expect(verifySpy).toHaveBeenCalledTimes(1);
    expect(verifier.cacheSize).toBe(1);
  });

  it("verifies again once the cache window has passed", async () => {
    let now = Date.now();
    const grant = await makeGrant();
    const verifier = makeVerifier(1_000, () => now);

    await verifier.verify(grant.accessToken);
    now += 1_001;
    await verifier.verify(grant.accessToken);

    expect(verifySpy).toHaveBeenCalledTimes(2);
  });

  it("never caches past the token's own expiry", async () => {
    let now = Date.now();
    const grant = await makeGrant({ expiresIn: 5 });
    const verifier = makeVerifier(60_000, () => now);

    await verifier.verify(grant.accessToken);
    now += 6_000;
    await verifier.verify(grant.accessToken).catch(() => undefined);

    expect(verifySpy).toHaveBeenCalledTimes(2);
  });

  it("does not cache when the window is zero", async () => {
    const grant = await makeGrant();
    const verifier = makeVerifier(0);

    await verifier.verify(grant.accessToken);
    await verifier.verify(grant.accessToken);

    expect(verifySpy).toHaveBeenCalledTimes(2);
    expect(verifier.cacheSize).toBe(0);
  });

  it("evicts the oldest live entry once the cache is full", async () => {
    const grants = await Promise.all([makeGrant(), makeGrant(), makeGrant()]);
    const verifier = new TokenVerifier({
      secret: TEST_SECRET,
      issuer: TEST_ISSUER,
      cacheTtlMs: 60_000,
      maxCacheEntries: 2,
    });

    for (const grant of grants) await verifier.verify(grant.accessToken);
    expect(verifier.cacheSize).toBe(2);

    await verifier.verify(grants[2]?.accessToken ?? "");
    expect(verifySpy).toHaveBeenCalledTimes(3);

    await verifier.verify(grants[0]?.accessToken ?? "");
    expect(verifySpy).toHaveBeenCalledTimes(4);
    expect(verifier.cacheSize).toBe(2);
  });

  it("rejects an expired token", async () => {
    const grant = await makeGrant({ expiresIn: -60 });
    await expect(makeVerifier().verify(grant.accessToken)).rejects.toBeInstanceOf(TokenRejectedError);
  });

  it("rejects a token signed with another key", async () => {
    const grant = await makeGrant();
    const verifier = new TokenVerifier({ secret: "another-test-secret", issuer: TEST_ISSUER, cacheTtlMs: 0 });
    await expect(verifier.verify(grant.accessToken)).rejects.toThrow("Access token failed verification");
  });

  it("rejects a token from an untrusted issuer", async () => {
    const grant = await makeGrant({ issuer: "someone-else" });
    await expect(makeVerifier().verify(grant.accessToken)).rejects.toThrow(
      "Access token issued by untrusted issuer someone-else",
    );
  });

  it("rejects an identity token presented as an access token", async () => {
    const grant = await makeGrant();
    await expect(makeVerifier().verify(grant.identityToken)).rejects.toThrow(
      "Access token is not a valid access token",
    );
  });
});

describe("TokenVerifier.verifyContext", () => {
  it("accepts a context that matches its token", async () => {
    const grant = await makeGrant();
    const context = buildContext(makeSession({ accessToken: grant.accessToken }), RequestId.make("req-1"));
    await expect(makeVerifier().verifyContext(context)).resolves.toMatchObject({ role: "analyst" });
  });

  it("rejects a context that claims a different role", async () => {
    const grant = await makeGrant();
    const context = buildContext(makeSession({ accessToken: grant.accessToken, role: "manager" }));

    const err = await makeVerifier().verifyContext(context).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthorizationError);
    expect(err).toHaveProperty(
      "message",
      "Declared role 'manager' does not match the access token role 'analyst'",
    );
  });

  it("rejects a context that claims a different user", async () => {
    const grant = await makeGrant();
    const context = { ...buildContext(makeSession({ accessToken: grant.accessToken })), userId: makeSession().userId };
    const other = await makeGrant({ sub: "manager@example.com" });

    await expect(makeVerifier().verifyContext({ ...context, accessToken: other.accessToken })).rejects.toThrow(
      "Declared user does not match the access token",
    );
  });
});
