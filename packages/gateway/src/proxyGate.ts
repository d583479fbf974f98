import { createConnection, createServer, Server, Socket } from "net";
import { CredentialStore } from "./credentialStore";
import { GatewayError, describeError, isTransientIoError } from "./errors";
import { closeServer, ListenRetryOptions, listenWithRetry } from "./listen";
import { Logger } from "./logger";
import { SETUP_ERROR_MESSAGE, renderErrorPage, renderSetupPage } from "./pages";
import { HeaderMap, RequestPreamble, isPreambleComplete, parseRequestPreamble } from "./requestPreamble";

/** Upper bound on bytes buffered before a connection is classified. */
export const MAX_PREAMBLE_BYTES = 16 * 1024;

export const BASIC_REALM = "Gateway Login";

export interface ProxyGateOptions {
  bindHost: string;
  port: number;
  upstreamHost: string;
  upstreamPort: number;
  idleTimeoutMs: number;
  retry: ListenRetryOptions;
}

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * TCP-level gate in front of a private upstream.
 *
 * Each accepted connection is handled on its own: the gate buffers only the
 * request preamble, decides setup / challenge / forward from it, and in the
 * forward case replays the buffered bytes to the upstream and then relays raw
 * bytes both ways. Nothing above the preamble is interpreted.
 */
export class ProxyGate {
  private server: Server | null = null;
  private connectionSeq = 0;
  private readonly sockets = new Set<Socket>();
  private boundPort = 0;

  public constructor(
    private readonly options: ProxyGateOptions,
    private readonly credentials: CredentialStore,
    private readonly logger: Logger,
  ) {}

  public get port(): number {
    return this.boundPort;
  }

  public async start(): Promise<number> {
    if (this.server) {
      return this.boundPort;
    }

    this.server = createServer((socket) => {
      void this.handleConnection(socket);
    });

    this.boundPort = await listenWithRetry(
      this.server,
      this.options.port,
      this.options.bindHost,
      this.options.retry,
      this.logger,
      "Proxy gate",
    );

    this.logger.info(
      `Proxy gate listening on ${this.options.bindHost}:${this.boundPort} -> ${this.options.upstreamHost}:${this.options.upstreamPort}`,
    );
    return this.boundPort;
  }

  public async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    await closeServer(this.server);
    this.server = null;
    this.logger.info("Proxy gate stopped.");
  }

  private async handleConnection(client: Socket): Promise<void> {
    const connectionId = this.nextConnectionId();
    this.track(client);
    client.on("error", (error) => {
      this.logSocketError(connectionId, "client", error);
    });

    try {
      const data = await this.readPreamble(client);
      if (!data) {
        this.logger.debug(`[${connectionId}] Closed before sending a request.`);
        client.destroy();
        return;
      }

      let preamble: RequestPreamble;
      try {
        preamble = parseRequestPreamble(data);
      } catch (error) {
        this.logger.warn(`[${connectionId}] Rejected malformed preamble: ${describeError(error)}`);
        respond(client, 400, "Bad Request", "text/html; charset=utf-8", renderErrorPage(400, "Bad request."));
        return;
      }

      this.logger.debug(`[${connectionId}] ${preamble.method} ${stripQuery(preamble.path)}`);

      if (!this.credentials.hasCredentials()) {
        await this.serveSetup(connectionId, client, preamble, data);
        return;
      }

      if (!(await this.isAuthorized(preamble.headers))) {
        this.logger.warn(`[${connectionId}] Basic auth denied for ${preamble.method} ${stripQuery(preamble.path)}`);
        respondUnauthorized(client);
        return;
      }

      this.pump(connectionId, client, data);
    } catch (error) {
      this.logger.error(`[${connectionId}] Handler error: ${describeError(error)}`);
      client.destroy();
    }
  }

  /**
   * Buffers the header block and any declared body, up to MAX_PREAMBLE_BYTES.
   * Resolves null when the peer leaves without sending anything. The socket is
   * left paused so nothing is lost before the pump attaches.
   */
  private readPreamble(client: Socket): Promise<Buffer | null> {
    return new Promise<Buffer | null>((resolvePromise) => {
      const chunks: Buffer[] = [];
      let total = 0;

      const finish = (result: Buffer | null): void => {
        client.off("data", onData);
        client.off("end", onEnd);
        client.off("close", onEnd);
        client.off("timeout", onTimeout);
        client.setTimeout(0);
        client.pause();
        resolvePromise(result);
      };

      const onData = (chunk: Buffer): void => {
        chunks.push(chunk);
        total += chunk.length;
        const data = Buffer.concat(chunks);
        if (total >= MAX_PREAMBLE_BYTES || isPreambleComplete(data)) {
          finish(data);
        }
      };

      const onEnd = (): void => {
        finish(total > 0 ? Buffer.concat(chunks) : null);
      };

      const onTimeout = (): void => {
        client.destroy();
        finish(null);
      };

      client.setTimeout(this.options.idleTimeoutMs);
      client.on("data", onData);
      client.once("end", onEnd);
      client.once("close", onEnd);
      client.once("timeout", onTimeout);
    });
  }

  private async serveSetup(
    connectionId: string,
    client: Socket,
    preamble: RequestPreamble,
    data: Buffer,
  ): Promise<void> {
    if (preamble.method !== "POST" || stripQuery(preamble.path) !== "/setup") {
      respond(client, 200, "OK", "text/html; charset=utf-8", renderSetupPage());
      return;
    }

    const body = preamble.bodyOffset === -1 ? "" : data.subarray(preamble.bodyOffset).toString("utf8");
    const form = new URLSearchParams(body);
    const username = (form.get("username") ?? "").trim();
    const password = form.get("password") ?? "";

    if (!username || !password) {
      this.logger.warn(`[${connectionId}] Rejected malformed setup submission.`);
      respond(client, 200, "OK", "text/html; charset=utf-8", renderSetupPage(SETUP_ERROR_MESSAGE));
      return;
    }

    await this.credentials.save(username, password);
    this.logger.info(`[${connectionId}] Credentials configured for ${username}.`);
    endWith(client, "HTTP/1.1 302 Found\r\nLocation: /\r\nContent-Length: 0\r\nConnection: close\r\n\r\n");
  }

  private async isAuthorized(headers: HeaderMap): Promise<boolean> {
    for (const value of headers.getAll("authorization")) {
      const pair = decodeBasicCredentials(value);
      if (pair && (await this.credentials.verify(pair.username, pair.password))) {
        return true;
      }
    }
    return false;
  }

  private pump(connectionId: string, client: Socket, initialData: Buffer): void {
    if (client.destroyed) {
      this.logger.debug(`[${connectionId}] Client left before the relay started.`);
      return;
    }

    const upstream = createConnection({ host: this.options.upstreamHost, port: this.options.upstreamPort });
    this.track(upstream);

    let connected = false;
    let closed = false;

    // A side that closed normally lets the other flush what is already relayed;
    // errors and the idle timeout cut both sides at once.
    const teardown = (reason: string, flush: boolean): void => {
      if (closed) {
        return;
      }
      closed = true;
      clearTimeout(idleTimer);
      for (const socket of [client, upstream]) {
        if (flush) {
          socket.destroySoon();
        } else {
          socket.destroy();
        }
      }
      this.logger.debug(`[${connectionId}] Relay closed (${reason}).`);
    };

    // Neither side producing data for the whole window ends the relay.
    const idleTimer = setTimeout(() => teardown("idle timeout", false), this.options.idleTimeoutMs);
    const touch = (): void => {
      idleTimer.refresh();
    };

    upstream.once("connect", () => {
      connected = true;
      this.logger.debug(`[${connectionId}] Upstream connected, relaying.`);
      upstream.write(initialData);
      client.on("data", touch);
      upstream.on("data", touch);
      client.pipe(upstream);
      upstream.pipe(client);
    });

    upstream.on("error", (error) => {
      if (!connected) {
        const failure = new GatewayError(
          "UPSTREAM_CONNECT_FAILED",
          `Upstream ${this.options.upstreamHost}:${this.options.upstreamPort} unreachable: ${describeError(error)}`,
        );
        this.logger.error(`[${connectionId}] ${failure.code}: ${failure.message}`);
      } else {
        this.logSocketError(connectionId, "upstream", error);
      }
      teardown("upstream error", false);
    });

    client.once("close", () => teardown("client closed", true));
    upstream.once("close", () => teardown("upstream closed", true));
  }

  private track(socket: Socket): void {
    this.sockets.add(socket);
    socket.once("close", () => {
      this.sockets.delete(socket);
    });
  }

  private logSocketError(connectionId: string, side: string, error: Error): void {
    if (isTransientIoError(error)) {
      this.logger.debug(`[${connectionId}] ${side} ended: ${describeError(error)}`);
      return;
    }
    this.logger.warn(`[${connectionId}] ${side} socket error: ${describeError(error)}`);
  }

  private nextConnectionId(): string {
    this.connectionSeq += 1;
    return `proxy-${this.connectionSeq}`;
  }
}

/**
 * Decodes `Basic <base64(username:password)>`. The scheme token and spacing
 * must match exactly and the base64 text must be canonical, so only the exact
 * header value a client derives from the credentials is accepted.
 */
export function decodeBasicCredentials(value: string): BasicCredentials | null {
  const match = /^Basic ([A-Za-z0-9+/]+={0,2})$/.exec(value);
  if (!match) {
    return null;
  }

  const encoded = match[1];
  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  if (Buffer.from(decoded, "utf8").toString("base64") !== encoded) {
    return null;
  }

  const colon = decoded.indexOf(":");
  if (colon === -1) {
    return null;
  }

  return {
    username: decoded.slice(0, colon),
    password: decoded.slice(colon + 1),
  };
}

export function encodeBasicCredentials(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

function respond(client: Socket, status: number, reason: string, contentType: string, body: string): void {
  const payload = Buffer.from(body, "utf8");
  const head =
    `HTTP/1.1 ${status} ${reason}\r\n` +
    `Content-Type: ${contentType}\r\n` +
    `Content-Length: ${payload.length}\r\n` +
    "Cache-Control: no-store\r\n" +
    "Connection: close\r\n\r\n";
  endWith(client, Buffer.concat([Buffer.from(head, "latin1"), payload]));
}

function respondUnauthorized(client: Socket): void {
  endWith(
    client,
    "HTTP/1.1 401 Unauthorized\r\n" +
      `WWW-Authenticate: Basic realm="${BASIC_REALM}"\r\n` +
      "Content-Length: 0\r\n" +
      "Connection: close\r\n\r\n",
  );
}

/**
 * Sends the final response and keeps reading so the peer's FIN is seen and the
 * socket closes.
 */
function endWith(client: Socket, payload: string | Buffer): void {
  client.end(payload);
  client.resume();
}

function stripQuery(path: string): string {
  const index = path.indexOf("?");
  return index === -1 ? path : path.slice(0, index);
}
