import { randomUUID } from "node:crypto";
import { bearerToken } from "../utils/http.js";
import { RequestId, UserId, type Role } from "../utils/types.js";
import type { Session } from "./types.js";

/**
 * The identity snapshot attached to every outbound request. Carries a bearer
 * access token and the declared role, never the refresh token.
 */
export interface PropagationContext {
  readonly accessToken: string;
  readonly role: Role;
  readonly userId: UserId;
  readonly requestId: RequestId;
}

export const PROPAGATION_HEADERS = {
  authorization: "authorization",
  userId: "x-user-id",
  role: "x-user-role",
  requestId: "x-request-id",
} as const;

export function newRequestId(): RequestId {
  return RequestId.make(randomUUID());
}

export function buildContext(session: Session, requestId: RequestId = newRequestId()): PropagationContext {
  return Object.freeze({
    accessToken: session.accessToken,
    role: session.role,
    userId: session.userId,
    requestId,
  });
}

export function toHeaders(context: PropagationContext): Record<string, string> {
  return {
    [PROPAGATION_HEADERS.authorization]: `Bearer ${context.accessToken}`,
    [PROPAGATION_HEADERS.userId]: context.userId,
    [PROPAGATION_HEADERS.role]: context.role,
    [PROPAGATION_HEADERS.requestId]: context.requestId,
  };
}

/** Rebuilds a context on the receiving hop; null when any part is missing. */
export function fromHeaders(headers: Headers): PropagationContext | null {
  const accessToken = bearerToken(headers.get(PROPAGATION_HEADERS.authorization));
  const userId = headers.get(PROPAGATION_HEADERS.userId);
  const role = headers.get(PROPAGATION_HEADERS.role);
  if (!accessToken || !userId || !role) return null;

  return Object.freeze({
    accessToken,
    role,
    userId: UserId.make(userId),
    requestId: RequestId.make(headers.get(PROPAGATION_HEADERS.requestId) ?? randomUUID()),
  });
}
