import { Hono } from "hono";
import { z } from "zod";
import { IdentityProviderError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { IdentityProvider, TokenGrant } from "./types.js";

const tokenRequestSchema = z.discriminatedUnion("grant_type", [
  z.object({
    grant_type: z.literal("password"),
    username: z.string().min(1),
    password: z.string().min(1),
  }),
  z.object({
    grant_type: z.literal("refresh_token"),
    refresh_token: z.string().min(1),
  }),
]);

const revokeRequestSchema = z.object({ token: z.string().min(1) });

function tokenResponse(grant: TokenGrant) {
  return {
    access_token: grant.accessToken,
    id_token: grant.identityToken,
    ...(grant.refreshToken ? { refresh_token: grant.refreshToken } : {}),
    expires_in: grant.expiresIn,
    token_type: "Bearer",
  };
}

/** Exposes an identity provider over OAuth2-style token and revocation endpoints. */
export function createIdentityApp(provider: IdentityProvider, logger: Logger): Hono {
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/oauth2/token", async (c) => {
    const parsed = tokenRequestSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: "invalid_request", error_description: "Malformed token request" }, 400);
    }
    const body = parsed.data;

    try {
      const grant =
        body.grant_type === "password"
          ? await provider.authenticate(body.username, body.password)
          : await provider.refresh(body.refresh_token);
      return c.json(tokenResponse(grant));
    } catch (err) {
      if (err instanceof IdentityProviderError && err.kind === "rejected") {
        logger.info({ grantType: body.grant_type }, "Token request rejected");
        return c.json({ error: "invalid_grant", error_description: err.message }, 400);
      }
      logger.error({ err, grantType: body.grant_type }, "Token request failed");
      return c.json({ error: "temporarily_unavailable" }, 503);
    }
  });

  app.post("/oauth2/revoke", async (c) => {
    const parsed = revokeRequestSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: "invalid_request" }, 400);
    }
    await provider.revoke(parsed.data.token);
    return c.json({ revoked: true });
  });

  return app;
}
