import { Server } from "net";
import { GatewayError, describeError, errorCode } from "./errors";
import { Logger } from "./logger";

export interface ListenRetryOptions {
  attempts: number;
  delayMs: number;
}

const MAX_BACKOFF_MS = 30_000;

/**
 * Binds `server`, retrying while the port is still held (slow container or
 * process restarts) with exponential backoff. Any other listen error, or
 * running out of attempts, rejects with BIND_FAILED.
 *
 * Resolves with the bound port, which differs from `port` when 0 was asked for.
 */
export async function listenWithRetry(
  server: Server,
  port: number,
  host: string,
  options: ListenRetryOptions,
  logger: Logger,
  label: string,
): Promise<number> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      await listenOnce(server, port, host);
      const address = server.address();
      return address && typeof address === "object" ? address.port : port;
    } catch (error) {
      const code = errorCode(error);
      if (code !== "EADDRINUSE" || attempt === attempts) {
        throw new GatewayError(
          "BIND_FAILED",
          `${label} could not bind ${host}:${port} after ${attempt} attempt(s): ${describeError(error)}`,
        );
      }

      const delayMs = Math.min(MAX_BACKOFF_MS, options.delayMs * 2 ** (attempt - 1));
      logger.warn(`${label} port ${port} busy, retrying in ${delayMs} ms (${attempt}/${attempts}).`);
      await sleep(delayMs);
    }
  }

  throw new GatewayError("BIND_FAILED", `${label} could not bind ${host}:${port}.`);
}

function listenOnce(server: Server, port: number, host: string): Promise<void> {
  return new Promise<void>((resolvePromise, rejectPromise) => {
    const onError = (error: Error): void => {
      server.off("listening", onListening);
      rejectPromise(error);
    };
    const onListening = (): void => {
      server.off("error", onError);
      resolvePromise();
    };

    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolvePromise) => {
    if (!server.listening) {
      resolvePromise();
      return;
    }
    server.close(() => resolvePromise());
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolvePromise) => setTimeout(resolvePromise, ms));
}
