import { createServer, IncomingMessage, Server } from "http";
import { Duplex } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import { BroadcastHub, HubConnection } from "./broadcastHub";
import { describeError, isTransientIoError } from "./errors";
import { closeServer, ListenRetryOptions, listenWithRetry } from "./listen";
import { Logger } from "./logger";

export interface BroadcastServerOptions {
  bindHost: string;
  port: number;
  path: string;
  retry: ListenRetryOptions;
}

/**
 * Adapts a `ws` socket to the hub's connection contract.
 */
export class WsHubConnection implements HubConnection {
  public constructor(
    public readonly id: string,
    private readonly socket: WebSocket,
  ) {}

  public send(payload: string): Promise<void> {
    return new Promise<void>((resolvePromise, rejectPromise) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        rejectPromise(new Error("WebSocket is not open."));
        return;
      }

      this.socket.send(payload, (error) => {
        if (error) {
          rejectPromise(error);
          return;
        }
        resolvePromise();
      });
    });
  }

  public close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) {
      return;
    }
    this.socket.close(code, reason);
  }
}

/**
 * Hosts the broadcast hub on its own port. Only upgrades on the configured
 * path are accepted; plain HTTP requests get 426.
 */
export class BroadcastServer {
  private server: Server | null = null;
  private wsServer: WebSocketServer | null = null;
  private connectionSeq = 0;
  private boundPort = 0;

  public constructor(
    private readonly options: BroadcastServerOptions,
    private readonly hub: BroadcastHub,
    private readonly logger: Logger,
  ) {}

  public get port(): number {
    return this.boundPort;
  }

  public async start(): Promise<number> {
    if (this.server) {
      return this.boundPort;
    }

    this.server = createServer((_request, response) => {
      response.statusCode = 426;
      response.setHeader("content-type", "text/plain; charset=utf-8");
      response.end("WebSocket upgrade required.");
    });

    this.wsServer = new WebSocketServer({ noServer: true });

    this.server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });

    this.boundPort = await listenWithRetry(
      this.server,
      this.options.port,
      this.options.bindHost,
      this.options.retry,
      this.logger,
      "Broadcast server",
    );

    this.logger.info(`Broadcast server listening on ws://${this.options.bindHost}:${this.boundPort}${this.options.path}`);
    return this.boundPort;
  }

  public async stop(): Promise<void> {
    this.hub.closeAll(1001, "server-shutdown");

    if (this.wsServer) {
      this.wsServer.clients.forEach((socket) => {
        socket.terminate();
      });
      this.wsServer.close();
      this.wsServer = null;
    }

    if (!this.server) {
      return;
    }

    this.server.closeAllConnections();
    await closeServer(this.server);
    this.server = null;
    this.logger.info("Broadcast server stopped.");
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const path = request.url ?? "/";
    const pathname = upgradePathname(path);

    if (pathname !== this.options.path || !this.wsServer) {
      this.logger.debug(`Rejected upgrade for ${pathname ?? "unparsable target"}.`);
      socket.destroy();
      return;
    }

    this.wsServer.handleUpgrade(request, socket, head, (clientSocket) => {
      const connection = new WsHubConnection(this.nextConnectionId(), clientSocket);

      clientSocket.on("close", () => {
        this.hub.unregister(connection);
      });

      clientSocket.on("error", (error) => {
        if (!isTransientIoError(error)) {
          this.logger.warn(`[${connection.id}] WebSocket error: ${describeError(error)}`);
        }
        this.hub.unregister(connection);
        connection.close(1011, "Server error");
      });

      this.hub.register(connection, request.headers, path);
    });
  }

  private nextConnectionId(): string {
    this.connectionSeq += 1;
    return `ws-${this.connectionSeq}`;
  }
}

function upgradePathname(path: string): string | null {
  try {
    return new URL(path, "http://localhost").pathname;
  } catch {
    return null;
  }
}
