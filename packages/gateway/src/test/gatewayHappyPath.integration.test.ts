import assert from "node:assert/strict";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { test, TestContext } from "node:test";
import WebSocket from "ws";
import { WS_UNAUTHORIZED_CLOSE_CODE } from "../../../shared/src/contracts";
import { BroadcastHub } from "../broadcastHub";
import { BroadcastServer } from "../broadcastServer";
import { CredentialStore } from "../credentialStore";
import { isGatewayError } from "../errors";
import { EventBridge } from "../eventBridge";
import { sendPlayAudioEvent } from "../eventProducer";
import { HttpGate } from "../httpGate";
import { SessionRegistry } from "../sessionRegistry";
import {
  MessageCollector,
  TEST_RETRY,
  closeWebSocket,
  createTempDir,
  isListenPermissionError,
  quietLogger,
  rawDataToString,
  rawExchange,
  waitFor,
  waitForClose,
} from "./helpers";

const COOKIE = "gateway_session";

interface Gateway {
  httpUrl: string;
  wsPort: number;
  wsUrl: string;
  eventPort: number;
  hub: BroadcastHub;
}

async function startGateway(t: TestContext): Promise<Gateway | null> {
  const temp = createTempDir();
  t.after(temp.cleanup);

  const publicDir = join(temp.dir, "public");
  mkdirSync(publicDir, { recursive: true });
  writeFileSync(join(publicDir, "audio.html"), "<!DOCTYPE html>");

  const logger = quietLogger();
  const credentials = new CredentialStore(join(temp.dir, "auth.json"), logger);
  const sessions = new SessionRegistry(60_000);
  const hub = new BroadcastHub(sessions, COOKIE, logger);

  const httpGate = new HttpGate(
    {
      bindHost: "127.0.0.1",
      port: 0,
      sessionCookieName: COOKIE,
      publicDir,
      entryPage: "/audio.html",
      assetsPrefix: "/assets/",
      retry: TEST_RETRY,
    },
    credentials,
    sessions,
    logger,
  );
  const broadcastServer = new BroadcastServer({ bindHost: "127.0.0.1", port: 0, path: "/ws", retry: TEST_RETRY }, hub, logger);
  const eventBridge = new EventBridge({ port: 0, retry: TEST_RETRY }, (event) => hub.scheduleBroadcast(event), logger);

  try {
    await httpGate.start();
    t.after(() => httpGate.stop());
    await broadcastServer.start();
    t.after(() => broadcastServer.stop());
    await eventBridge.start();
    t.after(() => eventBridge.stop());
  } catch (error) {
    if (isListenPermissionError(error) || isGatewayError(error, "BIND_FAILED")) {
      t.skip("Sandbox does not allow listening sockets.");
      return null;
    }
    throw error;
  }

  return {
    httpUrl: `http://127.0.0.1:${httpGate.port}`,
    wsPort: broadcastServer.port,
    wsUrl: `ws://127.0.0.1:${broadcastServer.port}/ws`,
    eventPort: eventBridge.port,
    hub,
  };
}

function postForm(url: string, body: string): Promise<Response> {
  return fetch(url, {
    method: "POST",
    redirect: "manual",
    headers: { "content-type": "application/x-www-form-urlencoded" },
    body,
  });
}

function readToken(body: unknown): string {
  if (!body || typeof body !== "object" || !("token" in body) || typeof body.token !== "string") {
    throw new Error(`Unexpected /ws_token body: ${JSON.stringify(body)}`);
  }
  return body.token;
}

test("setup, login, token and WebSocket delivery of a producer event", async (t) => {
  const gateway = await startGateway(t);
  if (!gateway) {
    return;
  }

  const setup = await postForm(`${gateway.httpUrl}/setup`, "username=admin&password=test-secret");
  assert.equal(setup.status, 302);

  const login = await postForm(`${gateway.httpUrl}/login`, "username=admin&password=test-secret");
  assert.equal(login.status, 302);
  const cookie = (login.headers.get("set-cookie") ?? "").split(";")[0];
  assert.match(cookie, /^gateway_session=.+/);

  const tokenResponse = await fetch(`${gateway.httpUrl}/ws_token`, { headers: { cookie } });
  assert.equal(tokenResponse.status, 200);
  const token = readToken(await tokenResponse.json());

  const socket = new WebSocket(`${gateway.wsUrl}?token=${encodeURIComponent(token)}`);
  const collector = new MessageCollector(socket);
  t.after(() => closeWebSocket(socket));

  assert.deepEqual(JSON.parse(await collector.next()), { type: "connected", message: "ok" });
  await waitFor(() => gateway.hub.size === 1);

  await sendPlayAudioEvent({ type: "play_audio", sound: "count", count: 7 }, { port: gateway.eventPort });

  assert.equal(await collector.next(), '{"type":"play_audio","sound":"count","count":7}');

  await sendPlayAudioEvent({ type: "play_audio", sound: "succeed" }, { port: gateway.eventPort });
  assert.equal(await collector.next(), '{"type":"play_audio","sound":"succeed"}');
});

test("the session cookie alone also admits a WebSocket client", async (t) => {
  const gateway = await startGateway(t);
  if (!gateway) {
    return;
  }

  await postForm(`${gateway.httpUrl}/setup`, "username=admin&password=test-secret");
  const login = await postForm(`${gateway.httpUrl}/login`, "username=admin&password=test-secret");
  const cookie = (login.headers.get("set-cookie") ?? "").split(";")[0];

  const socket = new WebSocket(gateway.wsUrl, { headers: { cookie } });
  const collector = new MessageCollector(socket);
  t.after(() => closeWebSocket(socket));

  assert.deepEqual(JSON.parse(await collector.next()), { type: "connected", message: "ok" });
});

test("a WebSocket without a session is closed with 4401 and receives no events", async (t) => {
  const gateway = await startGateway(t);
  if (!gateway) {
    return;
  }

  const socket = new WebSocket(`${gateway.wsUrl}?token=forged`);
  const received: string[] = [];
  socket.on("message", (data: WebSocket.RawData) => received.push(rawDataToString(data)));

  const closed = await waitForClose(socket);

  assert.equal(closed.code, WS_UNAUTHORIZED_CLOSE_CODE);
  assert.equal(closed.reason, "Unauthorized");
  assert.deepEqual(received, []);
  assert.equal(gateway.hub.size, 0);
});

test("plain HTTP requests to the broadcast port are told to upgrade", async (t) => {
  const gateway = await startGateway(t);
  if (!gateway) {
    return;
  }

  const response = await fetch(gateway.wsUrl.replace("ws://", "http://"));
  assert.equal(response.status, 426);
});

test("an upgrade with an unparsable request target is dropped and the hub keeps serving", async (t) => {
  const gateway = await startGateway(t);
  if (!gateway) {
    return;
  }

  const response = await rawExchange(
    gateway.wsPort,
    "GET http://a:99999/ws HTTP/1.1\r\n" +
      "Host: x\r\n" +
      "Upgrade: websocket\r\n" +
      "Connection: Upgrade\r\n" +
      "Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==\r\n" +
      "Sec-WebSocket-Version: 13\r\n\r\n",
  );
  assert.equal(response, "");
  assert.equal(gateway.hub.size, 0);

  const socket = new WebSocket(`${gateway.wsUrl}?token=forged`);
  const closed = await waitForClose(socket);
  assert.equal(closed.code, WS_UNAUTHORIZED_CLOSE_CODE);
});
