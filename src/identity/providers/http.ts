import { z } from "zod";
import { IdentityProviderError } from "../../errors.js";
import { joinUrl, readJson, type FetchFn } from "../../utils/http.js";
import type { IdentityProvider, TokenGrant } from "../types.js";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  id_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().int().positive(),
  token_type: z.string().optional(),
});

const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/** Client for an OAuth2-style token endpoint (see `createIdentityApp`). */
export class HttpIdentityProvider implements IdentityProvider {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  authenticate(username: string, password: string, signal?: AbortSignal): Promise<TokenGrant> {
    return this.tokenRequest({ grant_type: "password", username, password }, signal);
  }

  refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenGrant> {
    return this.tokenRequest({ grant_type: "refresh_token", refresh_token: refreshToken }, signal);
  }

  async revoke(refreshToken: string, signal?: AbortSignal): Promise<void> {
    const res = await this.post("/oauth2/revoke", { token: refreshToken }, signal);
    if (!res.ok) {
      throw new IdentityProviderError("unavailable", `Revocation failed with status ${res.status}`);
    }
  }

  private async tokenRequest(body: Record<string, string>, signal?: AbortSignal): Promise<TokenGrant> {
    const res = await this.post("/oauth2/token", body, signal);
    const json = await readJson(res);

    if (res.status === 400 || res.status === 401) {
      const error = oauthErrorSchema.safeParse(json);
      throw new IdentityProviderError(
        "rejected",
        error.success ? (error.data.error_description ?? error.data.error) : "Credentials rejected",
      );
    }
    if (!res.ok) {
      throw new IdentityProviderError("unavailable", `Identity provider answered ${res.status}`);
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new IdentityProviderError("unavailable", "Identity provider returned a malformed token response");
    }
    return {
      accessToken: parsed.data.access_token,
      identityToken: parsed.data.id_token,
      refreshToken: parsed.data.refresh_token,
      expiresIn: parsed.data.expires_in,
    };
  }

  private async post(path: string, body: Record<string, string>, signal?: AbortSignal): Promise<Response> {
    try {
      return await this.fetchFn(joinUrl(this.baseUrl, path), {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw new IdentityProviderError("unavailable", "Identity provider is unreachable", { cause: err });
    }
  }
}
