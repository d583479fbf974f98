import { resolve } from "path";
import { loadConfig } from "./config";
import { BroadcastHub } from "./broadcastHub";
import { BroadcastServer } from "./broadcastServer";
import { CredentialStore } from "./credentialStore";
import { describeError, isGatewayError } from "./errors";
import { EventBridge } from "./eventBridge";
import { HttpGate } from "./httpGate";
import { Logger } from "./logger";
import { ProxyGate } from "./proxyGate";
import { SessionRegistry } from "./sessionRegistry";
import { GatewayConfig } from "./types";

interface Component {
  stop(): Promise<void>;
}

async function main(): Promise<void> {
  // The gateway may be launched from different working directories.
  // Resolve repository root relative to this file for stable defaults.
  const repoRoot = resolve(__dirname, "..", "..", "..");
  const { config, configPath } = loadConfig(repoRoot);
  const logger = new Logger(config.verboseLogs, config.sessionCookieName);

  logger.info(`Loaded gateway configuration from ${configPath}`);
  logStartupPosture(config, logger);

  const retry = { attempts: config.bindRetryAttempts, delayMs: config.bindRetryDelayMs };
  const credentials = new CredentialStore(config.credentialFile, logger);
  const sessions = new SessionRegistry(config.sessionTtlSeconds * 1_000);
  const hub = new BroadcastHub(sessions, config.sessionCookieName, logger);

  const components: Component[] = [];
  const shutdown = async (): Promise<void> => {
    for (const component of [...components].reverse()) {
      await component.stop();
    }
  };

  try {
    const httpGate = new HttpGate(
      {
        bindHost: config.bindHost,
        port: config.httpPort,
        sessionCookieName: config.sessionCookieName,
        publicDir: config.publicDir,
        entryPage: config.entryPage,
        assetsPrefix: config.assetsPrefix,
        retry,
      },
      credentials,
      sessions,
      logger,
    );
    await httpGate.start();
    components.push(httpGate);

    const broadcastServer = new BroadcastServer(
      { bindHost: config.bindHost, port: config.wsPort, path: config.wsPath, retry },
      hub,
      logger,
    );
    await broadcastServer.start();
    components.push(broadcastServer);

    const eventBridge = new EventBridge(
      { port: config.eventPort, retry },
      (event) => hub.scheduleBroadcast(event),
      logger,
    );
    await eventBridge.start();
    components.push(eventBridge);

    if (config.proxyEnabled) {
      const proxyGate = new ProxyGate(
        {
          bindHost: config.bindHost,
          port: config.proxyPort,
          upstreamHost: config.upstreamHost,
          upstreamPort: config.upstreamPort,
          idleTimeoutMs: config.proxyIdleTimeoutMs,
          retry,
        },
        credentials,
        logger,
      );
      await proxyGate.start();
      components.push(proxyGate);
    }
  } catch (error) {
    await shutdown();
    throw error;
  }

  logger.info("Gateway ready.");

  const onSignal = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gateway.`);
    await shutdown();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void onSignal("SIGINT");
  });

  process.on("SIGTERM", () => {
    void onSignal("SIGTERM");
  });
}

void main().catch((error) => {
  const label = isGatewayError(error, "BIND_FAILED") ? "Could not bind listening ports" : "Fatal startup error";
  console.error(`[gateway] ${label}: ${describeError(error)}`);
  process.exit(1);
});

function logStartupPosture(config: GatewayConfig, logger: Logger): void {
  logger.info(`Credential file: ${config.credentialFile}`);
  logger.info(`Session TTL: ${config.sessionTtlSeconds} s, cookie: ${config.sessionCookieName}`);

  if (config.proxyEnabled) {
    logger.info(`Proxy gate enabled for upstream ${config.upstreamHost}:${config.upstreamPort}.`);
  } else {
    logger.info("Proxy gate disabled.");
  }

  if (!isLoopbackHost(config.bindHost)) {
    logger.warn("Gateway is bound beyond localhost without TLS; put it behind a TLS terminator for remote use.");
  }
}

function isLoopbackHost(host: string): boolean {
  return host === "127.0.0.1" || host === "::1" || host === "localhost";
}
