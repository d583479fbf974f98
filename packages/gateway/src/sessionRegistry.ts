import { randomBytes } from "crypto";
import { Session } from "./types";

export const SESSION_TOKEN_BYTES = 32;

/**
 * In-memory token → session map.
 *
 * Sessions expire after the configured TTL. Expired entries are dropped lazily
 * on lookup and by `pruneExpired`. Nothing survives a restart.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  public constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  public get size(): number {
    return this.sessions.size;
  }

  public create(username: string): string {
    const token = randomBytes(SESSION_TOKEN_BYTES).toString("base64url");
    this.sessions.set(token, {
      token,
      username,
      expiresAt: this.now() + this.ttlMs,
    });
    return token;
  }

  public get(token: string | null | undefined): Session | null {
    if (!token) {
      return null;
    }

    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }

    if (session.expiresAt <= this.now()) {
      this.sessions.delete(token);
      return null;
    }

    return { ...session };
  }

  public delete(token: string | null | undefined): boolean {
    if (!token) {
      return false;
    }
    return this.sessions.delete(token);
  }

  public pruneExpired(): number {
    const nowMs = this.now();
    let removed = 0;

    for (const [token, session] of this.sessions.entries()) {
      if (session.expiresAt <= nowMs) {
        this.sessions.delete(token);
        removed += 1;
      }
    }

    return removed;
  }
}
