import { createServer, Server, Socket } from "net";
import { PlayAudioEvent, parsePlayAudioEvent } from "../../shared/src/contracts";
import { GatewayError, describeError, isTransientIoError } from "./errors";
import { closeServer, ListenRetryOptions, listenWithRetry } from "./listen";
import { Logger } from "./logger";

export const EVENT_BRIDGE_HOST = "127.0.0.1";
export const MAX_EVENT_BYTES = 4 * 1024;
export const EVENT_READ_TIMEOUT_MS = 2_000;

export interface EventBridgeOptions {
  port: number;
  retry: ListenRetryOptions;
  readTimeoutMs?: number;
}

/** Hands a validated event to the hub's own context. */
export type ScheduleBroadcast = (event: PlayAudioEvent) => void;

/**
 * Loopback-only intake for events from the local producer.
 *
 * One JSON object per connection; the bridge reads it, closes the connection
 * without replying, and passes recognized events to `scheduleBroadcast`. A bad
 * message is logged and dropped; it never stops the listener.
 */
export class EventBridge {
  private server: Server | null = null;
  private eventSeq = 0;
  private boundPort = 0;
  private readonly sockets = new Set<Socket>();

  public constructor(
    private readonly options: EventBridgeOptions,
    private readonly scheduleBroadcast: ScheduleBroadcast,
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
      this.handleConnection(socket);
    });

    this.boundPort = await listenWithRetry(
      this.server,
      this.options.port,
      EVENT_BRIDGE_HOST,
      this.options.retry,
      this.logger,
      "Event bridge",
    );

    this.logger.info(`Event bridge listening on ${EVENT_BRIDGE_HOST}:${this.boundPort}`);
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
    this.logger.info("Event bridge stopped.");
  }

  private handleConnection(socket: Socket): void {
    const eventId = this.nextEventId();
    const chunks: Buffer[] = [];
    let total = 0;
    let settled = false;

    this.sockets.add(socket);

    const settle = (payload: string | null, failure?: string): void => {
      if (settled) {
        return;
      }
      settled = true;
      socket.setTimeout(0);
      socket.destroy();

      if (failure) {
        this.logger.warn(`[${eventId}] Dropped event: ${failure}`);
        return;
      }
      if (payload !== null) {
        this.dispatch(eventId, payload);
      }
    };

    socket.setTimeout(this.options.readTimeoutMs ?? EVENT_READ_TIMEOUT_MS);

    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
      total += chunk.length;
      if (total > MAX_EVENT_BYTES) {
        settle(null, `payload exceeds ${MAX_EVENT_BYTES} bytes`);
        return;
      }

      // A producer may keep the socket open; one complete JSON value is enough.
      const text = Buffer.concat(chunks).toString("utf8");
      if (isCompleteJson(text)) {
        settle(text);
      }
    });

    socket.once("end", () => {
      const text = Buffer.concat(chunks).toString("utf8");
      settle(text.trim() ? text : null);
    });

    socket.once("timeout", () => {
      settle(null, `no complete payload within ${this.options.readTimeoutMs ?? EVENT_READ_TIMEOUT_MS} ms`);
    });

    socket.on("error", (error) => {
      if (!isTransientIoError(error)) {
        this.logger.warn(`[${eventId}] Producer socket error: ${describeError(error)}`);
      }
      settle(null);
    });

    socket.once("close", () => {
      this.sockets.delete(socket);
    });
  }

  private dispatch(eventId: string, payload: string): void {
    this.logger.debug(`[${eventId}] Received ${payload.trim()}`);

    let event: PlayAudioEvent;
    try {
      event = parsePlayAudioEvent(parseJson(payload));
    } catch (error) {
      this.logger.warn(`[${eventId}] Dropped event: ${describeError(error)}`);
      return;
    }

    this.scheduleBroadcast(event);
  }

  private nextEventId(): string {
    this.eventSeq += 1;
    return `event-${this.eventSeq}`;
  }
}

function parseJson(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new GatewayError("PROTOCOL_ERROR", `Invalid JSON payload: ${describeError(error)}`);
  }
}

function isCompleteJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}
