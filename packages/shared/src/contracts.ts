/**
 * Wire contracts shared by the gateway and the local event producer.
 */
export const PLAY_AUDIO_EVENT_TYPE = "play_audio";

export const SOUNDS = ["count", "milestone", "succeed"] as const;

export type Sound = (typeof SOUNDS)[number];

export interface PlayAudioEvent {
  type: typeof PLAY_AUDIO_EVENT_TYPE;
  sound: Sound;
  count?: number;
}

export interface ConnectedAck {
  type: "connected";
  message: "ok";
}

export interface WsTokenResponse {
  token: string;
}

export const CONNECTED_ACK: ConnectedAck = { type: "connected", message: "ok" };

/** Close code sent to WebSocket handshakes that carry no valid session. */
export const WS_UNAUTHORIZED_CLOSE_CODE = 4401;

/**
 * Parse and validate a play-audio event payload.
 * Throws a descriptive error when payload is invalid.
 */
export function parsePlayAudioEvent(value: unknown): PlayAudioEvent {
  const payload = requireObject(value, "event payload");

  if (payload.type !== PLAY_AUDIO_EVENT_TYPE) {
    throw new Error(`Unrecognized event type '${String(payload.type)}'.`);
  }

  const sound = parseSound(payload.sound);
  const count = parseOptionalCount(payload.count);

  return {
    type: PLAY_AUDIO_EVENT_TYPE,
    sound,
    ...(count !== undefined ? { count } : {}),
  };
}

/**
 * Serializes an event with a stable key order: type, sound, count.
 */
export function serializePlayAudioEvent(event: PlayAudioEvent): string {
  const frame: PlayAudioEvent = { type: event.type, sound: event.sound };
  if (event.count !== undefined) {
    frame.count = event.count;
  }
  return JSON.stringify(frame);
}

export function isSound(value: unknown): value is Sound {
  return SOUNDS.some((sound) => sound === value);
}

export function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }

  return value as Record<string, unknown>;
}

function parseSound(value: unknown): Sound {
  // Producers that omit the sound mean the per-rep tick.
  if (value === undefined) {
    return "count";
  }
  if (!isSound(value)) {
    throw new Error(`Field 'sound' must be one of ${SOUNDS.join(", ")}.`);
  }
  return value;
}

function parseOptionalCount(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error("Field 'count' must be an integer, null, or omitted.");
  }
  return value;
}
