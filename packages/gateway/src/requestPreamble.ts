import { GatewayError } from "./errors";

const HEADER_TERMINATOR = Buffer.from("\r\n\r\n", "latin1");

/**
 * Case-insensitive, multi-valued header lookup built from raw header lines.
 */
export class HeaderMap {
  private readonly values = new Map<string, string[]>();

  public add(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.values.get(key);
    if (existing) {
      existing.push(value);
      return;
    }
    this.values.set(key, [value]);
  }

  public get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.[0];
  }

  public getAll(name: string): string[] {
    return [...(this.values.get(name.toLowerCase()) ?? [])];
  }

  public has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }
}

export interface RequestPreamble {
  method: string;
  path: string;
  version: string;
  headers: HeaderMap;
  /** Offset of the first body byte, or -1 when the header block is incomplete. */
  bodyOffset: number;
}

/**
 * Returns the offset just past the blank line ending the header block, or -1.
 */
export function findHeaderEnd(data: Buffer): number {
  const index = data.indexOf(HEADER_TERMINATOR);
  return index === -1 ? -1 : index + HEADER_TERMINATOR.length;
}

/**
 * Tokenizes the request line and header block of a buffered preamble.
 *
 * Only the preamble is interpreted; everything after it is left for the caller
 * to forward untouched. A truncated header block yields the headers read so
 * far with `bodyOffset` -1. Throws a PROTOCOL_ERROR when no request line can
 * be recovered.
 */
export function parseRequestPreamble(data: Buffer): RequestPreamble {
  const headerEnd = findHeaderEnd(data);
  const text = data.subarray(0, headerEnd === -1 ? data.length : headerEnd).toString("latin1");
  const lines = text.split("\r\n");

  const requestLine = lines[0] ?? "";
  const parts = requestLine.split(" ").filter(Boolean);
  if (parts.length < 2 || parts.length > 3 || !/^[A-Z]+$/.test(parts[0])) {
    throw new GatewayError("PROTOCOL_ERROR", "Malformed request line.");
  }

  const headers = new HeaderMap();
  for (const line of lines.slice(1)) {
    if (!line) {
      continue;
    }
    const colon = line.indexOf(":");
    if (colon <= 0) {
      continue;
    }
    headers.add(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
  }

  return {
    method: parts[0],
    path: parts[1],
    version: parts[2] ?? "HTTP/1.0",
    headers,
    bodyOffset: headerEnd,
  };
}

/**
 * Declared body length, or 0 when absent or unparsable.
 */
export function contentLength(headers: HeaderMap): number {
  const raw = headers.get("content-length");
  if (!raw || !/^\d+$/.test(raw)) {
    return 0;
  }
  return Number(raw);
}

/**
 * True once the buffer holds the full header block plus the declared body.
 */
export function isPreambleComplete(data: Buffer): boolean {
  const headerEnd = findHeaderEnd(data);
  if (headerEnd === -1) {
    return false;
  }

  try {
    const preamble = parseRequestPreamble(data);
    return data.length - headerEnd >= contentLength(preamble.headers);
  } catch {
    // Malformed requests are complete as far as reading is concerned.
    return true;
  }
}
