import { parseArgs } from "node:util";
import { ConsoleKeySender } from "@handkeys/control-core";
import type { GestureEngineOptions } from "@handkeys/gesture-core";
import { replaySession } from "./replay";
import { loadSession } from "./session";

const USAGE = "usage: handkeys-replay <session.json> [--skip-frames N] [--cooldown SECONDS] [--threshold DEGREES] [--debug]";

function parseNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

async function main(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "skip-frames": { type: "string" },
      cooldown: { type: "string" },
      threshold: { type: "string" },
      debug: { type: "boolean", default: false },
    },
  });

  const [path] = positionals;
  if (!path) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const gestureOptions: GestureEngineOptions = {};
  const cooldown = parseNumber("cooldown", values.cooldown);
  if (cooldown !== undefined) gestureOptions.cooldownSeconds = cooldown;
  const threshold = parseNumber("threshold", values.threshold);
  if (threshold !== undefined) gestureOptions.angularThresholdDegrees = threshold;

  const session = await loadSession(path);
  const { summary, keys } = await replaySession(session, {
    skipFrames: parseNumber("skip-frames", values["skip-frames"]),
    gestureOptions,
    sender: new ConsoleKeySender(),
    debug: values.debug,
  });

  console.log(
    `Replayed ${summary.framesRead} frames (${summary.framesProcessed} processed), sent ${keys.length} keys`
  );
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
