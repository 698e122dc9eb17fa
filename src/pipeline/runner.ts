import { Command, CommandExecutor } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { NodeContext } from "@effect/platform-node";
import { Clock, Duration, Effect, Either, Option, Stream } from "effect";
import { loadAppConfig } from "../config";
import type { Batch, RunOutcome } from "../core/schema";

export const STDOUT_TAIL_LINES = 5;
export const STDERR_TAIL_LINES = 3;

/** Environment variable carrying the comma-separated ids of the batch. */
export const BATCH_IDS_ENV = "MONITOR_BATCH_IDS";

export interface PipelineSettings {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  readonly folderFlag: string;
  readonly folderId: string;
  readonly timeout: Duration.DurationInput;
  readonly workingDirectory?: string | undefined;
}

/**
 * Last `count` non-blank lines of a process stream, trimmed.
 */
export const tailLines = (text: string, count: number): ReadonlyArray<string> =>
  text
    .trim()
    .split(/\r?\n/)
    .slice(-count)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

export const buildCommand = (settings: PipelineSettings, batch: Batch): Command.Command => {
  const command = Command.make(
    settings.command,
    ...settings.args,
    settings.folderFlag,
    settings.folderId
  ).pipe(Command.env({ [BATCH_IDS_ENV]: batch.map((item) => item.id).join(",") }));

  return settings.workingDirectory !== undefined
    ? Command.workingDirectory(command, settings.workingDirectory)
    : command;
};

const collectText = (stream: Stream.Stream<Uint8Array, PlatformError>) =>
  stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (acc, chunk) => acc + chunk)
  );

const forceKill = (child: CommandExecutor.Process) =>
  child.isRunning.pipe(
    Effect.flatMap((running) => (running ? child.kill("SIGKILL") : Effect.void)),
    Effect.catchAll((error) => Effect.logWarning(`Failed to kill pipeline: ${error.message}`))
  );

type OutcomeFields = Partial<RunOutcome> & Pick<RunOutcome, "succeeded" | "durationMs">;

const outcome = (fields: OutcomeFields): RunOutcome => ({
  exitCode: -1,
  stdoutTail: [],
  stderrTail: [],
  durationExceeded: false,
  ...fields,
});

export interface PipelineRunnerShape {
  readonly run: (batch: Batch) => Effect.Effect<RunOutcome>;
}

export const makePipelineRunner = (
  settings: PipelineSettings
): Effect.Effect<PipelineRunnerShape, never, CommandExecutor.CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor;
    const timeout = Duration.decode(settings.timeout);

    // None when the deadline passed. The SIGKILL finalizer is added after
    // Command.start, so it runs before the platform's SIGTERM-and-wait.
    const execute = (batch: Batch) =>
      Effect.scoped(
        Effect.gen(function* () {
          const child = yield* Command.start(buildCommand(settings, batch));
          yield* Effect.addFinalizer(() => forceKill(child));

          const completed = yield* Effect.all(
            [child.exitCode, collectText(child.stdout), collectText(child.stderr)],
            { concurrency: "unbounded" }
          ).pipe(Effect.timeoutOption(timeout));

          if (Option.isNone(completed)) {
            yield* Effect.logWarning(`Pipeline exceeded ${Duration.format(timeout)}, killing it`);
          }
          return completed;
        })
      ).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor));

    const run = (batch: Batch): Effect.Effect<RunOutcome> =>
      Effect.gen(function* () {
        const startedAt = yield* Clock.currentTimeMillis;
        const result = yield* Effect.either(execute(batch));
        const durationMs = (yield* Clock.currentTimeMillis) - startedAt;

        if (Either.isLeft(result)) {
          return outcome({
            succeeded: false,
            durationMs,
            stderrTail: [result.left.message],
          });
        }

        if (Option.isNone(result.right)) {
          return outcome({ succeeded: false, durationExceeded: true, durationMs });
        }

        const [exitCode, stdout, stderr] = result.right.value;
        if (exitCode === 0) {
          return outcome({
            succeeded: true,
            exitCode,
            durationMs,
            stdoutTail: tailLines(stdout, STDOUT_TAIL_LINES),
          });
        }
        return outcome({
          succeeded: false,
          exitCode,
          durationMs,
          stderrTail: tailLines(stderr, STDERR_TAIL_LINES),
        });
      });

    return { run };
  });

export class PipelineRunner extends Effect.Service<PipelineRunner>()("PipelineRunner", {
  effect: Effect.gen(function* () {
    const config = yield* loadAppConfig;
    return yield* makePipelineRunner({
      command: config.pipeline.command,
      args: config.pipeline.args,
      folderFlag: config.pipeline.folderFlag,
      folderId: config.drive.folderId,
      timeout: Duration.seconds(config.pipeline.timeoutSeconds),
      workingDirectory: config.pipeline.workingDirectory,
    });
  }),
  dependencies: [NodeContext.layer],
}) {}
