import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import { existsSync, readFileSync, statSync } from "fs";
import { extname, join, normalize, posix, resolve, sep } from "path";
import { URL } from "url";
import { WsTokenResponse } from "../../shared/src/contracts";
import { clearedSessionCookie, sessionCookie, sessionTokenFromHeaders } from "./cookies";
import { CredentialStore } from "./credentialStore";
import { GatewayError, describeError } from "./errors";
import { closeServer, ListenRetryOptions, listenWithRetry } from "./listen";
import { Logger } from "./logger";
import {
  LOGIN_ERROR_MESSAGE,
  SETUP_ERROR_MESSAGE,
  renderErrorPage,
  renderLoginPage,
  renderSetupPage,
} from "./pages";
import { SessionRegistry } from "./sessionRegistry";
import { Session } from "./types";

const MAX_FORM_BODY_BYTES = 64 * 1024;
const REQUEST_TIMEOUT_MS = 20_000;
const SESSION_PRUNE_INTERVAL_MS = 60_000;

export interface HttpGateOptions {
  bindHost: string;
  port: number;
  sessionCookieName: string;
  publicDir: string;
  entryPage: string;
  assetsPrefix: string;
  retry: ListenRetryOptions;
}

interface AuthContext {
  token: string;
  session: Session;
}

/**
 * Browser-facing gate.
 *
 * Responsibilities:
 * - first-run setup of the operator credential,
 * - login/logout with a session cookie,
 * - WS token issuance for the broadcast socket,
 * - serving the allow-listed UI files to signed-in browsers.
 *
 * Whether credentials exist is re-read on every request, so a setup done
 * through the proxy gate is picked up here without a restart.
 */
export class HttpGate {
  private server: Server | null = null;
  private pruneTimer: NodeJS.Timeout | null = null;
  private requestSeq = 0;
  private boundPort = 0;

  public constructor(
    private readonly options: HttpGateOptions,
    private readonly credentials: CredentialStore,
    private readonly sessions: SessionRegistry,
    private readonly logger: Logger,
  ) {}

  public get port(): number {
    return this.boundPort;
  }

  public async start(): Promise<number> {
    if (this.server) {
      return this.boundPort;
    }

    this.server = createServer((request, response) => {
      void this.handleRequest(request, response);
    });

    this.server.requestTimeout = REQUEST_TIMEOUT_MS;

    this.boundPort = await listenWithRetry(
      this.server,
      this.options.port,
      this.options.bindHost,
      this.options.retry,
      this.logger,
      "HTTP gate",
    );

    this.pruneTimer = setInterval(() => {
      const removed = this.sessions.pruneExpired();
      if (removed > 0) {
        this.logger.debug(`Pruned ${removed} expired session(s).`);
      }
    }, SESSION_PRUNE_INTERVAL_MS);
    this.pruneTimer.unref();

    const mode = this.credentials.hasCredentials() ? "login" : "setup";
    this.logger.info(`HTTP gate listening on http://${this.options.bindHost}:${this.boundPort} (mode=${mode})`);
    this.logger.info(`Serving UI files from: ${this.options.publicDir}`);
    return this.boundPort;
  }

  public async stop(): Promise<void> {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }

    if (!this.server) {
      return;
    }

    this.server.closeAllConnections();
    await closeServer(this.server);
    this.server = null;
    this.logger.info("HTTP gate stopped.");
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const requestId = this.nextRequestId();
    const method = request.method ?? "GET";

    try {
      const pathname = this.parseUrl(request).pathname;
      this.logger.debug(`[${requestId}] ${method} ${pathname}`);

      if (!this.credentials.hasCredentials()) {
        await this.handleSetupState(method, pathname, request, response, requestId);
        return;
      }

      await this.handleCredentialedState(method, pathname, request, response, requestId);
    } catch (error) {
      this.logger.error(`[${requestId}] Unhandled request error: ${describeError(error)}`);
      if (!response.headersSent) {
        this.writeHtml(response, 500, renderErrorPage(500, "Unexpected gateway error."));
      } else {
        response.destroy();
      }
    }
  }

  private async handleSetupState(
    method: string,
    pathname: string,
    request: IncomingMessage,
    response: ServerResponse,
    requestId: string,
  ): Promise<void> {
    if (method === "GET") {
      this.writeHtml(response, 200, renderSetupPage());
      return;
    }

    if (method !== "POST" || pathname !== "/setup") {
      this.writeMethodNotAllowed(response);
      return;
    }

    let username = "";
    let password = "";
    try {
      const form = await this.readForm(request);
      username = (form.get("username") ?? "").trim();
      password = form.get("password") ?? "";
    } catch (error) {
      this.logger.warn(`[${requestId}] Setup body rejected: ${describeError(error)}`);
    }

    if (!username || !password) {
      this.writeHtml(response, 200, renderSetupPage(SETUP_ERROR_MESSAGE));
      return;
    }

    await this.credentials.save(username, password);
    this.logger.info(`[${requestId}] Credentials configured for ${username}.`);
    this.redirect(response, "/login");
  }

  private async handleCredentialedState(
    method: string,
    pathname: string,
    request: IncomingMessage,
    response: ServerResponse,
    requestId: string,
  ): Promise<void> {
    if (method === "POST" && pathname === "/login") {
      await this.handleLogin(request, response, requestId);
      return;
    }

    if (method !== "GET") {
      this.writeMethodNotAllowed(response);
      return;
    }

    if (pathname === "/setup") {
      this.redirect(response, "/login");
      return;
    }

    const auth = this.authenticate(request);

    if (pathname === "/login") {
      if (auth) {
        this.redirect(response, "/");
        return;
      }
      this.writeHtml(response, 200, renderLoginPage());
      return;
    }

    if (pathname === "/logout") {
      const token = sessionTokenFromHeaders(request.headers, this.options.sessionCookieName);
      if (this.sessions.delete(token)) {
        this.logger.info(`[${requestId}] Session ended.`);
      }
      response.setHeader("set-cookie", clearedSessionCookie(this.options.sessionCookieName));
      this.redirect(response, "/login");
      return;
    }

    if (!auth) {
      if (pathname === "/" || pathname === this.options.entryPage) {
        this.redirect(response, "/login");
        return;
      }
      this.logger.debug(`[${requestId}] Session required for ${pathname}`);
      if (pathname === "/ws_token") {
        this.writeJson(response, 401, { error: "UNAUTHORIZED", message: "Authentication required." });
        return;
      }
      this.writeHtml(response, 401, renderErrorPage(401, "Authentication required."));
      return;
    }

    if (pathname === "/") {
      this.redirect(response, this.options.entryPage);
      return;
    }

    if (pathname === "/ws_token") {
      const payload: WsTokenResponse = { token: auth.token };
      response.setHeader("cache-control", "no-store");
      this.writeJson(response, 200, payload);
      return;
    }

    // The allow-list applies to the path the file lookup will actually use.
    const staticPath = posix.normalize(decodePath(pathname));
    if (!this.isAllowedStaticPath(staticPath)) {
      this.writeHtml(response, 404, renderErrorPage(404, "Not found."));
      return;
    }

    this.serveStaticFile(staticPath, response, requestId);
  }

  private async handleLogin(request: IncomingMessage, response: ServerResponse, requestId: string): Promise<void> {
    let username = "";
    let password = "";
    try {
      const form = await this.readForm(request);
      username = (form.get("username") ?? "").trim();
      password = form.get("password") ?? "";
    } catch (error) {
      this.logger.warn(`[${requestId}] Login body rejected: ${describeError(error)}`);
    }

    if (await this.credentials.verify(username, password)) {
      const token = this.sessions.create(username);
      this.logger.info(`[${requestId}] Login succeeded for ${username}.`);
      response.setHeader("set-cookie", sessionCookie(this.options.sessionCookieName, token));
      this.redirect(response, "/");
      return;
    }

    this.logger.warn(`[${requestId}] Login failed.`);
    this.writeHtml(response, 200, renderLoginPage(LOGIN_ERROR_MESSAGE, username));
  }

  private authenticate(request: IncomingMessage): AuthContext | null {
    const token = sessionTokenFromHeaders(request.headers, this.options.sessionCookieName);
    const session = this.sessions.get(token);
    if (!token || !session) {
      return null;
    }
    return { token, session };
  }

  private isAllowedStaticPath(pathname: string): boolean {
    return pathname === this.options.entryPage || pathname.startsWith(this.options.assetsPrefix);
  }

  /**
   * Request targets that do not parse as a URL are routed as `/`.
   */
  private parseUrl(request: IncomingMessage): URL {
    const host = request.headers.host ?? `${this.options.bindHost}:${this.options.port}`;
    for (const base of [`http://${host}`, "http://localhost"]) {
      try {
        return new URL(request.url ?? "/", base);
      } catch {
        continue;
      }
    }
    return new URL("/", "http://localhost");
  }

  private async readForm(request: IncomingMessage): Promise<URLSearchParams> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    for await (const chunk of request) {
      const piece = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      totalBytes += piece.length;

      if (totalBytes > MAX_FORM_BODY_BYTES) {
        throw new GatewayError("PROTOCOL_ERROR", "Form payload exceeded limit.");
      }

      chunks.push(piece);
    }

    const raw = Buffer.concat(chunks).toString("utf8");
    if (!raw.trim()) {
      throw new GatewayError("PROTOCOL_ERROR", "Form payload is empty.");
    }
    return new URLSearchParams(raw);
  }

  private serveStaticFile(pathname: string, response: ServerResponse, requestId: string): void {
    // Force relative static paths so `join(publicDir, safePath)` never discards `publicDir`.
    const safePath = normalize(pathname)
      .replace(/^[/\\]+/, "")
      .replace(/^\.+/, "");
    const filePath = resolve(join(this.options.publicDir, safePath));

    const publicRoot = resolve(this.options.publicDir);
    if (!filePath.startsWith(publicRoot + sep)) {
      this.logger.warn(`[${requestId}] Rejected static path outside public dir: ${pathname}`);
      this.writeHtml(response, 404, renderErrorPage(404, "Not found."));
      return;
    }

    if (!existsSync(filePath) || !statSafeIsFile(filePath)) {
      this.writeHtml(response, 404, renderErrorPage(404, "Not found."));
      return;
    }

    const content = readFileSync(filePath);
    response.statusCode = 200;
    response.setHeader("content-type", contentTypeFor(filePath));
    response.setHeader("cache-control", "no-store");
    response.end(content);
  }

  private redirect(response: ServerResponse, location: string): void {
    response.statusCode = 302;
    response.setHeader("location", location);
    response.end();
  }

  private writeHtml(response: ServerResponse, statusCode: number, html: string): void {
    response.statusCode = statusCode;
    response.setHeader("content-type", "text/html; charset=utf-8");
    response.setHeader("cache-control", "no-store");
    response.end(html);
  }

  private writeJson(response: ServerResponse, statusCode: number, payload: unknown): void {
    response.statusCode = statusCode;
    response.setHeader("content-type", "application/json; charset=utf-8");
    response.end(JSON.stringify(payload));
  }

  private writeMethodNotAllowed(response: ServerResponse): void {
    this.writeHtml(response, 405, renderErrorPage(405, "Method not allowed."));
  }

  private nextRequestId(): string {
    this.requestSeq += 1;
    return `http-${this.requestSeq}`;
  }
}

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

function contentTypeFor(filePath: string): string {
  const extension = extname(filePath).toLowerCase();

  switch (extension) {
    case ".html":
      return "text/html; charset=utf-8";
    case ".css":
      return "text/css; charset=utf-8";
    case ".js":
      return "application/javascript; charset=utf-8";
    case ".json":
      return "application/json; charset=utf-8";
    case ".svg":
      return "image/svg+xml";
    case ".png":
      return "image/png";
    case ".mp3":
      return "audio/mpeg";
    case ".wav":
      return "audio/wav";
    default:
      return "application/octet-stream";
  }
}

function statSafeIsFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}
