import assert from "node:assert/strict";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { test } from "node:test";
import { loadConfig } from "../config";
import { createTempDir } from "./helpers";

test("loadConfig falls back to defaults and persists them when the file is missing", (t) => {
  const temp = createTempDir();
  t.after(temp.cleanup);
  const configPath = join(temp.dir, "gateway.config.json");

  const { config } = loadConfig(temp.dir, { GATEWAY_CONFIG: configPath });

  assert.equal(config.httpPort, 8080);
  assert.equal(config.wsPort, 8765);
  assert.equal(config.eventPort, 8865);
  assert.equal(config.sessionTtlSeconds, 43_200);
  assert.equal(config.sessionCookieName, "gateway_session");
  assert.equal(config.credentialFile, resolve(temp.dir, "data/auth.json"));
  assert.equal(config.proxyEnabled, true);
  assert.equal(config.proxyIdleTimeoutMs, 60_000);
  assert.equal(config.wsPath, "/ws");
  assert.ok(existsSync(configPath));
  assert.equal(JSON.parse(readFileSync(configPath, "utf8")).httpPort, 8080);
});

test("environment variables override the file, which overrides defaults", (t) => {
  const temp = createTempDir();
  t.after(temp.cleanup);
  const configPath = join(temp.dir, "gateway.config.json");
  writeFileSync(configPath, JSON.stringify({ httpPort: 9000, wsPort: 9001, upstreamHost: "10.0.0.5" }));

  const { config } = loadConfig(temp.dir, {
    GATEWAY_CONFIG: configPath,
    GATEWAY_HTTP_PORT: "9100",
    GATEWAY_PROXY_ENABLED: "no",
    GATEWAY_WS_PATH: "events",
  });

  assert.equal(config.httpPort, 9100);
  assert.equal(config.wsPort, 9001);
  assert.equal(config.upstreamHost, "10.0.0.5");
  assert.equal(config.proxyEnabled, false);
  assert.equal(config.wsPath, "/events");
});

test("numeric settings are clamped and invalid values fall back", (t) => {
  const temp = createTempDir();
  t.after(temp.cleanup);
  const configPath = join(temp.dir, "gateway.config.json");
  writeFileSync(configPath, "{ not json");

  const { config } = loadConfig(temp.dir, {
    GATEWAY_CONFIG: configPath,
    GATEWAY_SESSION_TTL_SECONDS: "5",
    GATEWAY_HTTP_PORT: "70000",
    GATEWAY_WS_PORT: "abc",
  });

  assert.equal(config.sessionTtlSeconds, 60);
  assert.equal(config.httpPort, 65535);
  assert.equal(config.wsPort, 8765);
});

test("loadConfig leaves a missing file alone when persistence is off", (t) => {
  const temp = createTempDir();
  t.after(temp.cleanup);
  const configPath = join(temp.dir, "gateway.config.json");

  const { config } = loadConfig(temp.dir, { GATEWAY_CONFIG: configPath, GATEWAY_EVENT_PORT: "9901" }, { persist: false });

  assert.equal(config.eventPort, 9901);
  assert.equal(existsSync(configPath), false);
});
