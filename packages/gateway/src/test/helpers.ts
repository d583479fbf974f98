import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { once } from "node:events";
import { createServer, Server, Socket } from "node:net";
import WebSocket from "ws";
import { Logger } from "../logger";

export const TEST_RETRY = { attempts: 1, delayMs: 10 };

/** Logger that keeps test output readable; failures still surface via assertions. */
export function quietLogger(): Logger {
  return new Logger(false);
}

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "audio-gate-test-"));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function isListenPermissionError(error: unknown): boolean {
  if (!error || typeof error !== "object" || !("code" in error)) {
    return false;
  }
  return error.code === "EPERM" || error.code === "EACCES";
}

export interface StubUpstream {
  readonly port: number;
  readonly connections: number;
  readonly received: Buffer[];
  stop(): Promise<void>;
}

/**
 * In-process TCP upstream that records the first chunk of each connection,
 * answers it with `reply` and closes.
 */
export async function startStubUpstream(reply: string): Promise<StubUpstream> {
  const sockets = new Set<Socket>();
  const received: Buffer[] = [];
  let connections = 0;

  const server: Server = createServer((socket) => {
    connections += 1;
    sockets.add(socket);
    socket.once("data", (chunk: Buffer) => {
      received.push(chunk);
      socket.end(reply);
    });
    socket.on("error", () => undefined);
    socket.once("close", () => sockets.delete(socket));
  });

  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  const port = address && typeof address === "object" ? address.port : 0;

  return {
    port,
    get connections() {
      return connections;
    },
    received,
    async stop(): Promise<void> {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolvePromise) => server.close(() => resolvePromise()));
    },
  };
}

/**
 * Writes `payload` to a raw TCP connection and collects everything until the
 * peer closes.
 */
export async function rawExchange(port: number, payload: string | Buffer, timeoutMs = 5_000): Promise<string> {
  const socket = new Socket();
  const chunks: Buffer[] = [];

  return await new Promise<string>((resolvePromise, rejectPromise) => {
    const timer = setTimeout(() => {
      socket.destroy();
      rejectPromise(new Error(`No close from 127.0.0.1:${port} within ${timeoutMs} ms.`));
    }, timeoutMs);

    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("error", (error) => {
      clearTimeout(timer);
      rejectPromise(error);
    });
    socket.on("close", () => {
      clearTimeout(timer);
      resolvePromise(Buffer.concat(chunks).toString("utf8"));
    });
    socket.connect(port, "127.0.0.1", () => {
      socket.write(payload);
    });
  });
}

/**
 * Collects WebSocket frames from the moment the socket is created so none are
 * missed between `open` and the first wait.
 */
export class MessageCollector {
  private readonly messages: string[] = [];
  private waiters: Array<() => void> = [];

  public constructor(private readonly socket: WebSocket) {
    socket.on("message", (data: WebSocket.RawData) => {
      this.messages.push(rawDataToString(data));
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) {
        waiter();
      }
    });
  }

  public async next(timeoutMs = 2_500): Promise<string> {
    const deadline = Date.now() + timeoutMs;
    while (this.messages.length === 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new Error(`Timed out waiting for websocket message after ${timeoutMs} ms.`);
      }
      await new Promise<void>((resolvePromise) => {
        const timer = setTimeout(resolvePromise, remaining);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolvePromise();
        });
      });
    }
    const message = this.messages.shift();
    if (message === undefined) {
      throw new Error("Message queue drained unexpectedly.");
    }
    return message;
  }

  public get socketState(): number {
    return this.socket.readyState;
  }
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

export async function waitForClose(socket: WebSocket, timeoutMs = 2_500): Promise<{ code: number; reason: string }> {
  return await new Promise((resolvePromise, rejectPromise) => {
    const timer = setTimeout(() => rejectPromise(new Error("Timed out waiting for websocket close.")), timeoutMs);
    socket.once("close", (code: number, reason: Buffer) => {
      clearTimeout(timer);
      resolvePromise({ code, reason: reason.toString("utf8") });
    });
  });
}

export async function closeWebSocket(socket: WebSocket): Promise<void> {
  if (socket.readyState === WebSocket.CLOSED) {
    return;
  }

  await new Promise<void>((resolvePromise) => {
    socket.once("close", () => resolvePromise());
    socket.close();
  });
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs} ms.`);
    }
    await new Promise((resolvePromise) => setTimeout(resolvePromise, 10));
  }
}
