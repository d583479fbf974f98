import { HandshakeHeaders, Session } from "./types";
import { SessionRegistry } from "./sessionRegistry";

export function parseCookies(header: string | string[] | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) {
    return cookies;
  }

  const joined = Array.isArray(header) ? header.join(";") : header;
  for (const part of joined.split(";")) {
    const eqIndex = part.indexOf("=");
    if (eqIndex <= 0) {
      continue;
    }
    const name = part.slice(0, eqIndex).trim();
    const value = part.slice(eqIndex + 1).trim();
    if (name && !(name in cookies)) {
      cookies[name] = value;
    }
  }

  return cookies;
}

export function sessionCookie(name: string, token: string): string {
  return `${name}=${token}; Path=/; HttpOnly; SameSite=Strict`;
}

export function clearedSessionCookie(name: string): string {
  return `${name}=; Path=/; Max-Age=0; HttpOnly; SameSite=Strict`;
}

export function sessionTokenFromHeaders(headers: HandshakeHeaders, cookieName: string): string | null {
  const cookies = parseCookies(headers.cookie);
  return cookies[cookieName] || null;
}

/**
 * Resolves a session from the cookie header first, then from a `token` query
 * parameter on the request path. WebSocket handshakes from browsers cannot set
 * headers, so the query form is validated the same way as the cookie.
 */
export function resolveSession(
  sessions: SessionRegistry,
  cookieName: string,
  headers: HandshakeHeaders,
  path: string | undefined,
): Session | null {
  const fromCookie = sessions.get(sessionTokenFromHeaders(headers, cookieName));
  if (fromCookie) {
    return fromCookie;
  }

  return sessions.get(queryToken(path));
}

export function queryToken(path: string | undefined): string | null {
  if (!path) {
    return null;
  }

  try {
    return new URL(path, "http://localhost").searchParams.get("token");
  } catch {
    return null;
  }
}
