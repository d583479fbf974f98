import {
  CONNECTED_ACK,
  PlayAudioEvent,
  WS_UNAUTHORIZED_CLOSE_CODE,
  serializePlayAudioEvent,
} from "../../shared/src/contracts";
import { parseCookies, queryToken, resolveSession } from "./cookies";
import { describeError } from "./errors";
import { Logger } from "./logger";
import { SessionRegistry } from "./sessionRegistry";
import { HandshakeHeaders } from "./types";

/**
 * A live client as the hub sees it. `send` settles once the frame is handed to
 * the transport and rejects when the connection is closed or broken.
 */
export interface HubConnection {
  readonly id: string;
  send(payload: string): Promise<void>;
  close(code: number, reason: string): void;
}

export interface BroadcastResult {
  delivered: number;
  pruned: number;
}

/**
 * Fan-out point for play-audio events.
 *
 * The live set and the session registry are only touched from the hub's own
 * callbacks; other components reach `broadcast` through `scheduleBroadcast`.
 */
export class BroadcastHub {
  private readonly clients = new Set<HubConnection>();

  public constructor(
    private readonly sessions: SessionRegistry,
    private readonly cookieName: string,
    private readonly logger: Logger,
  ) {}

  public get size(): number {
    return this.clients.size;
  }

  public has(connection: HubConnection): boolean {
    return this.clients.has(connection);
  }

  /**
   * Admits a connection whose handshake carries a valid session cookie or
   * `token` query parameter, then acknowledges it. Anything else is closed
   * with the unauthorized code and never joins the live set.
   */
  public register(connection: HubConnection, handshakeHeaders: HandshakeHeaders, handshakePath: string): boolean {
    const session = resolveSession(this.sessions, this.cookieName, handshakeHeaders, handshakePath);
    if (!session) {
      const cookiePresent = this.cookieName in parseCookies(handshakeHeaders.cookie);
      const tokenPresent = queryToken(handshakePath) !== null;
      this.logger.warn(
        `[${connection.id}] Unauthorized WebSocket rejected (cookie_present=${cookiePresent}, token_present=${tokenPresent}).`,
      );
      connection.close(WS_UNAUTHORIZED_CLOSE_CODE, "Unauthorized");
      return false;
    }

    this.clients.add(connection);
    this.logger.info(`[${connection.id}] Client connected for ${session.username} (clients=${this.clients.size}).`);

    sendSafely(connection, JSON.stringify(CONNECTED_ACK)).catch((error: unknown) => {
      this.logger.debug(`[${connection.id}] Acknowledgment failed: ${describeError(error)}`);
      this.unregister(connection);
    });
    return true;
  }

  public unregister(connection: HubConnection): boolean {
    const removed = this.clients.delete(connection);
    if (removed) {
      this.logger.info(`[${connection.id}] Client disconnected (clients=${this.clients.size}).`);
    }
    return removed;
  }

  /**
   * Sends one serialized frame to every live client. All sends are issued
   * before any is awaited; clients whose send failed are removed after the
   * sweep.
   */
  public async broadcast(event: PlayAudioEvent): Promise<BroadcastResult> {
    if (this.clients.size === 0) {
      this.logger.info(`No connected clients, skipping ${event.type} (${event.sound}).`);
      return { delivered: 0, pruned: 0 };
    }

    const message = serializePlayAudioEvent(event);
    const targets = [...this.clients];
    this.logger.info(
      `Broadcasting ${event.type} sound=${event.sound}${event.count !== undefined ? ` count=${event.count}` : ""} clients=${targets.length}`,
    );

    const results = await Promise.allSettled(targets.map((connection) => sendSafely(connection, message)));

    const stale: HubConnection[] = [];
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.debug(`[${targets[index].id}] Send failed: ${describeError(result.reason)}`);
        stale.push(targets[index]);
      }
    });

    for (const connection of stale) {
      this.unregister(connection);
    }

    return { delivered: targets.length - stale.length, pruned: stale.length };
  }

  /**
   * Defers a broadcast to its own event-loop turn. This is the only entry point
   * for producers outside the hub.
   */
  public scheduleBroadcast(event: PlayAudioEvent): void {
    setImmediate(() => {
      this.broadcast(event).catch((error: unknown) => {
        this.logger.error(`Broadcast failed: ${describeError(error)}`);
      });
    });
  }

  public closeAll(code: number, reason: string): void {
    const targets = [...this.clients];
    this.clients.clear();
    for (const connection of targets) {
      connection.close(code, reason);
    }
  }
}

async function sendSafely(connection: HubConnection, payload: string): Promise<void> {
  await connection.send(payload);
}
