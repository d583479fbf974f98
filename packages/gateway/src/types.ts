export interface GatewayConfig {
  bindHost: string;
  httpPort: number;
  wsPort: number;
  wsPath: string;
  eventPort: number;
  sessionTtlSeconds: number;
  sessionCookieName: string;
  credentialFile: string;
  publicDir: string;
  entryPage: string;
  assetsPrefix: string;
  proxyEnabled: boolean;
  proxyPort: number;
  upstreamHost: string;
  upstreamPort: number;
  proxyIdleTimeoutMs: number;
  bindRetryAttempts: number;
  bindRetryDelayMs: number;
  verboseLogs: boolean;
}

export interface Session {
  token: string;
  username: string;
  expiresAt: number;
}

/** Stored credential record, either hashed (canonical) or legacy plaintext. */
export interface CredentialRecord {
  username: string;
  salt?: string;
  password_hash?: string;
  password?: string;
}

/** Header bag as delivered by `http` handshakes. */
export type HandshakeHeaders = Record<string, string | string[] | undefined>;
