import { AuthorizationError } from "../errors.js";
import type { RegistryEntry } from "../tools/types.js";
import type { Role } from "../utils/types.js";

/**
 * Per-call role check. A tool restricted to other roles is refused, and so
 * is any argument the caller's role may not supply.
 */
export function authorizeCall(
  entry: RegistryEntry,
  args: Readonly<Record<string, unknown>>,
  role: Role,
): void {
  if (entry.allowedRoles && !entry.allowedRoles.includes(role)) {
    throw new AuthorizationError(`Role '${role}' is not allowed to call ${entry.name}`);
  }

  for (const [name, property] of Object.entries(entry.inputSchema.properties)) {
    if (!property.restrictedToRoles || !(name in args)) continue;
    if (!property.restrictedToRoles.includes(role)) {
      throw new AuthorizationError(`Role '${role}' may not set '${name}' on ${entry.name}`);
    }
  }
}
