import assert from "node:assert/strict";
import { test } from "node:test";
import { isGatewayError } from "../errors";
import { contentLength, findHeaderEnd, isPreambleComplete, parseRequestPreamble } from "../requestPreamble";

function buffer(text: string): Buffer {
  return Buffer.from(text, "latin1");
}

test("parseRequestPreamble reads the request line and case-insensitive headers", () => {
  const data = buffer("GET /status?x=1 HTTP/1.1\r\nHost: example\r\nAuthorization: Basic abc\r\nX-Multi: a\r\nx-multi: b\r\n\r\nrest");
  const preamble = parseRequestPreamble(data);

  assert.equal(preamble.method, "GET");
  assert.equal(preamble.path, "/status?x=1");
  assert.equal(preamble.version, "HTTP/1.1");
  assert.equal(preamble.headers.get("authorization"), "Basic abc");
  assert.equal(preamble.headers.get("HOST"), "example");
  assert.deepEqual(preamble.headers.getAll("X-MULTI"), ["a", "b"]);
  assert.equal(preamble.headers.has("cookie"), false);
  assert.equal(data.subarray(preamble.bodyOffset).toString("latin1"), "rest");
});

test("a truncated header block keeps the headers read so far", () => {
  const preamble = parseRequestPreamble(buffer("GET / HTTP/1.1\r\nHost: example\r\n"));

  assert.equal(preamble.bodyOffset, -1);
  assert.equal(preamble.headers.get("host"), "example");
});

test("a request line without a version defaults to HTTP/1.0", () => {
  assert.equal(parseRequestPreamble(buffer("GET /\r\n\r\n")).version, "HTTP/1.0");
});

test("malformed request lines raise a protocol error", () => {
  for (const text of ["\r\n\r\n", "GET\r\n\r\n", "get / HTTP/1.1\r\n\r\n", "GET / HTTP/1.1 extra\r\n\r\n"]) {
    assert.throws(
      () => parseRequestPreamble(buffer(text)),
      (error: unknown) => isGatewayError(error, "PROTOCOL_ERROR"),
      text,
    );
  }
});

test("isPreambleComplete waits for the header terminator and the declared body", () => {
  const head = "POST /setup HTTP/1.1\r\nContent-Length: 5\r\n\r\n";

  assert.equal(isPreambleComplete(buffer("POST /setup HTTP/1.1\r\n")), false);
  assert.equal(isPreambleComplete(buffer(`${head}ab`)), false);
  assert.equal(isPreambleComplete(buffer(`${head}abcde`)), true);
  assert.equal(isPreambleComplete(buffer("GET / HTTP/1.1\r\n\r\n")), true);
  assert.equal(isPreambleComplete(buffer("bogus\r\n\r\n")), true);
});

test("contentLength ignores non-numeric values", () => {
  const headers = parseRequestPreamble(buffer("POST / HTTP/1.1\r\nContent-Length: 12\r\n\r\n")).headers;
  assert.equal(contentLength(headers), 12);

  const bogus = parseRequestPreamble(buffer("POST / HTTP/1.1\r\nContent-Length: -3\r\n\r\n")).headers;
  assert.equal(contentLength(bogus), 0);
});

test("findHeaderEnd points just past the blank line", () => {
  assert.equal(findHeaderEnd(buffer("GET / HTTP/1.1\r\n\r\nbody")), 18);
  assert.equal(findHeaderEnd(buffer("GET / HTTP/1.1\r\n")), -1);
});
