import type { SessionId } from "../utils/types.js";
import type { Session } from "./types.js";

/**
 * Holds the one live Session of a single user interaction context. No I/O.
 * A server that handles several users creates one store per connected user.
 */
export class CredentialStore {
  private current: Session | null = null;

  get(id: SessionId): Session | null {
    return this.current?.id === id ? this.current : null;
  }

  /** The live session, if any. */
  active(): Session | null {
    return this.current;
  }

  /** Replaces whatever session was live before. */
  set(session: Session): void {
    this.current = session;
  }

  clear(id?: SessionId): void {
    if (id === undefined || this.current?.id === id) {
      this.current = null;
    }
  }

  isLive(session: Session): boolean {
    return this.current === session;
  }
}
