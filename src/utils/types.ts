declare const brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [brand]: B };

export type SessionId = Brand<string, "SessionId">;
export type UserId = Brand<string, "UserId">;
export type RequestId = Brand<string, "RequestId">;

export const SessionId = {
  make: (value: string): SessionId => value as SessionId,
};

export const UserId = {
  make: (value: string): UserId => value as UserId,
};

export const RequestId = {
  make: (value: string): RequestId => value as RequestId,
};

/** Roles are an open set; the two below are the ones the bundled registry knows. */
export type Role = "analyst" | "manager" | (string & {});
