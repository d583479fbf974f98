import { resolve } from "path";
import { PLAY_AUDIO_EVENT_TYPE, SOUNDS, isSound, PlayAudioEvent } from "../../shared/src/contracts";
import { loadConfig } from "./config";
import { describeError } from "./errors";
import { sendPlayAudioEvent } from "./eventProducer";

/**
 * Sends one play-audio event to a running gateway.
 *
 * Usage: emit <count|milestone|succeed> [count]
 */
async function main(argv: string[]): Promise<void> {
  const [sound, rawCount] = argv;
  if (!isSound(sound)) {
    throw new Error(`Usage: emit <${SOUNDS.join("|")}> [count]`);
  }

  const event: PlayAudioEvent = { type: PLAY_AUDIO_EVENT_TYPE, sound };
  if (rawCount !== undefined) {
    const count = Number(rawCount);
    if (!Number.isInteger(count)) {
      throw new Error(`Count must be an integer, got '${rawCount}'.`);
    }
    event.count = count;
  }

  const { config } = loadConfig(resolve(__dirname, "..", "..", ".."), process.env, { persist: false });
  await sendPlayAudioEvent(event, { port: config.eventPort });
  console.log(`Sent ${event.sound}${event.count !== undefined ? ` (${event.count})` : ""} to 127.0.0.1:${config.eventPort}`);
}

void main(process.argv.slice(2)).catch((error) => {
  console.error(`[emit] ${describeError(error)}`);
  process.exit(1);
});
