import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { GatewayConfig } from "./types";

type GatewayConfigFile = Partial<GatewayConfig>;

/**
 * Loads runtime configuration from JSON and environment variables.
 *
 * Precedence order:
 * 1. Environment variables.
 * 2. JSON file content.
 * 3. Built-in defaults.
 *
 * Relative paths (credential file, public dir) resolve against `cwd`.
 */
export interface LoadConfigOptions {
  /** Write the effective config when the file is missing. Defaults to true. */
  persist?: boolean;
}

export function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {},
): { config: GatewayConfig; configPath: string } {
  const configPath = env.GATEWAY_CONFIG
    ? resolve(env.GATEWAY_CONFIG)
    : resolve(cwd, "packages/gateway/config/gateway.config.json");

  const fileConfig = loadConfigFile(configPath);

  const config: GatewayConfig = {
    bindHost: normalizeString(env.GATEWAY_BIND_HOST, fileConfig.bindHost, "0.0.0.0"),
    httpPort: normalizeNumber(env.GATEWAY_HTTP_PORT, fileConfig.httpPort, 8080, 1, 65535),
    wsPort: normalizeNumber(env.GATEWAY_WS_PORT, fileConfig.wsPort, 8765, 1, 65535),
    wsPath: normalizePath(env.GATEWAY_WS_PATH, fileConfig.wsPath, "/ws"),
    eventPort: normalizeNumber(env.GATEWAY_EVENT_PORT, fileConfig.eventPort, 8865, 1, 65535),
    sessionTtlSeconds: normalizeNumber(
      env.GATEWAY_SESSION_TTL_SECONDS,
      fileConfig.sessionTtlSeconds,
      43_200,
      60,
      30 * 86_400,
    ),
    sessionCookieName: normalizeString(env.GATEWAY_SESSION_COOKIE, fileConfig.sessionCookieName, "gateway_session"),
    credentialFile: resolve(cwd, normalizeString(env.GATEWAY_CREDENTIAL_FILE, fileConfig.credentialFile, "data/auth.json")),
    publicDir: resolve(cwd, normalizeString(env.GATEWAY_PUBLIC_DIR, fileConfig.publicDir, "packages/gateway/public")),
    entryPage: normalizePath(env.GATEWAY_ENTRY_PAGE, fileConfig.entryPage, "/audio.html"),
    assetsPrefix: normalizePath(env.GATEWAY_ASSETS_PREFIX, fileConfig.assetsPrefix, "/assets/"),
    proxyEnabled: normalizeBoolean(env.GATEWAY_PROXY_ENABLED, fileConfig.proxyEnabled, true),
    proxyPort: normalizeNumber(env.GATEWAY_PROXY_PORT, fileConfig.proxyPort, 6080, 1, 65535),
    upstreamHost: normalizeString(env.GATEWAY_UPSTREAM_HOST, fileConfig.upstreamHost, "localhost"),
    upstreamPort: normalizeNumber(env.GATEWAY_UPSTREAM_PORT, fileConfig.upstreamPort, 6081, 1, 65535),
    proxyIdleTimeoutMs: normalizeNumber(
      env.GATEWAY_PROXY_IDLE_TIMEOUT_MS,
      fileConfig.proxyIdleTimeoutMs,
      60_000,
      1_000,
      3_600_000,
    ),
    bindRetryAttempts: normalizeNumber(env.GATEWAY_BIND_RETRY_ATTEMPTS, fileConfig.bindRetryAttempts, 5, 1, 50),
    bindRetryDelayMs: normalizeNumber(env.GATEWAY_BIND_RETRY_DELAY_MS, fileConfig.bindRetryDelayMs, 2_000, 10, 60_000),
    verboseLogs: normalizeBoolean(env.GATEWAY_VERBOSE, fileConfig.verboseLogs, false),
  };

  if (options.persist ?? true) {
    persistConfigIfMissing(configPath, config);
  }

  return { config, configPath };
}

function loadConfigFile(configPath: string): GatewayConfigFile {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const raw = readFileSync(configPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      return {};
    }
    return parsed as GatewayConfigFile;
  } catch {
    return {};
  }
}

function persistConfigIfMissing(configPath: string, config: GatewayConfig): void {
  if (existsSync(configPath)) {
    return;
  }

  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(config, null, 2));
}

function normalizeString(primary: string | undefined, secondary: unknown, fallback: string): string {
  const candidate = primary ?? (typeof secondary === "string" ? secondary : undefined) ?? fallback;
  const value = candidate.trim();
  return value || fallback;
}

function normalizePath(primary: string | undefined, secondary: unknown, fallback: string): string {
  const value = normalizeString(primary, secondary, fallback);
  return value.startsWith("/") ? value : `/${value}`;
}

function normalizeNumber(
  primary: string | undefined,
  secondary: unknown,
  fallback: number,
  min: number,
  max: number,
): number {
  const fromEnv = primary ? Number(primary) : undefined;
  const candidate = fromEnv !== undefined && Number.isFinite(fromEnv) ? fromEnv : secondary;

  if (typeof candidate !== "number" || !Number.isFinite(candidate)) {
    return fallback;
  }

  const bounded = Math.floor(candidate);
  if (bounded < min) {
    return min;
  }
  if (bounded > max) {
    return max;
  }
  return bounded;
}

function normalizeBoolean(primary: string | undefined, secondary: unknown, fallback: boolean): boolean {
  if (typeof primary === "string") {
    const value = primary.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes";
  }

  if (typeof secondary === "boolean") {
    return secondary;
  }

  return fallback;
}
