import { decode } from "hono/jwt";
import { z } from "zod";
import { IdentityProviderError } from "../errors.js";

export const ROLE_CLAIM = "custom:role";

export const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.string().min(1),
  token_use: z.literal("access"),
  iss: z.string().min(1),
  exp: z.number(),
});

export type AccessClaims = z.infer<typeof accessClaimsSchema>;

const identityClaimsSchema = z.object({
  sub: z.string().min(1),
  name: z.string().optional(),
  email: z.string().optional(),
  [ROLE_CLAIM]: z.string().min(1).default("user"),
});

export interface IdentityClaims {
  readonly sub: string;
  readonly name?: string;
  readonly email?: string;
  readonly role: string;
}

/**
 * Reads the user attributes carried by an identity token. The token arrived
 * straight from the identity provider, so it is decoded, not verified; hops
 * that authorize requests verify the access token instead.
 */
export function readIdentityClaims(identityToken: string): IdentityClaims {
  let payload: unknown;
  try {
    payload = decode(identityToken).payload;
  } catch (err) {
    throw new IdentityProviderError("rejected", "Identity token is malformed", { cause: err });
  }
  const parsed = identityClaimsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new IdentityProviderError("rejected", "Identity token is missing required claims");
  }
  const claims = parsed.data;
  return {
    sub: claims.sub,
    name: claims.name,
    email: claims.email,
    role: claims[ROLE_CLAIM],
  };
}
