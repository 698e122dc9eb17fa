import { Effect, Layer } from "effect";
import { type CliArgs, cliConfigProvider, parseCliArgs } from "./config";
import { MonitorService } from "./scheduler/monitor";

const run = (cli: CliArgs) =>
  Effect.gen(function* () {
    const monitor = yield* MonitorService;

    if (cli.test) {
      yield* Effect.logInfo("=== TEST MODE: single cycle ===");
      const result = yield* monitor.runOnce;
      yield* Effect.logInfo(`Test cycle finished: ${result._tag}`);
      return;
    }

    yield* monitor.runForever;
  }).pipe(
    Effect.provide(
      MonitorService.Default.pipe(Layer.provide(Layer.setConfigProvider(cliConfigProvider(cli))))
    )
  );

/**
 * The monitor for one command line. Logging is left to the caller, so the
 * logger it provides also covers building the services.
 */
export const program = (args: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const cli = yield* parseCliArgs(args);
    yield* run(cli);
  }).pipe(
    Effect.tapErrorTag("ConfigurationError", (err) =>
      Effect.logFatal(`Cannot start monitor: ${err.message}`)
    )
  );
