import { createConnection } from "net";
import { PlayAudioEvent, serializePlayAudioEvent } from "../../shared/src/contracts";
import { EVENT_BRIDGE_HOST } from "./eventBridge";

export interface ProducerOptions {
  port: number;
  host?: string;
  timeoutMs?: number;
}

/**
 * Delivers one event to the event bridge: connect, write, end. Resolves once
 * the payload is flushed and the socket has closed.
 */
export function sendPlayAudioEvent(event: PlayAudioEvent, options: ProducerOptions): Promise<void> {
  const host = options.host ?? EVENT_BRIDGE_HOST;
  const timeoutMs = options.timeoutMs ?? 1_000;

  return new Promise<void>((resolvePromise, rejectPromise) => {
    let failed = false;
    const socket = createConnection({ host, port: options.port });

    socket.setTimeout(timeoutMs);
    socket.once("timeout", () => {
      failed = true;
      socket.destroy();
      rejectPromise(new Error(`Event bridge at ${host}:${options.port} did not respond within ${timeoutMs} ms.`));
    });

    socket.once("connect", () => {
      socket.end(serializePlayAudioEvent(event));
    });

    // The bridge closes its side without replying.
    socket.resume();

    socket.once("error", (error) => {
      failed = true;
      rejectPromise(error);
    });

    socket.once("close", () => {
      if (!failed) {
        resolvePromise();
      }
    });
  });
}
