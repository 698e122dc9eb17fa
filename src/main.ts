/**
 * Answer Card Monitor
 *
 * Watches a Drive folder for scanned answer cards and runs the correction
 * pipeline on each new batch.
 *
 *   tsx src/main.ts [--interval <minutes>] [--test]
 */

import { NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";
import { loadEnvFile } from "./config";
import { LoggerLive } from "./core/logger";
import { program } from "./program";

const main = Effect.gen(function* () {
  const loaded = yield* loadEnvFile();
  yield* Effect.gen(function* () {
    yield* Effect.logDebug(`Loaded ${loaded} settings from .env`);
    yield* program(process.argv.slice(2));
  }).pipe(Effect.provide(LoggerLive));
});

NodeRuntime.runMain(main, { disableErrorReporting: true });
