import { Data, Effect, Either } from "effect";
import { loadAppConfig } from "../config";
import type { ClassificationRules, RunOutcome } from "../core/schema";
import { DriveService, type RemoteError } from "../drive/client";
import { PipelineRunner } from "../pipeline/runner";
import { HistoryStore } from "../state/store";
import { classify } from "./classify";

export type CycleResult = Data.TaggedEnum<{
  ListingFailed: { readonly error: RemoteError };
  Empty: { readonly listed: number; readonly known: number };
  PipelineFailed: { readonly batchSize: number; readonly outcome: RunOutcome };
  Committed: { readonly committed: number; readonly outcome: RunOutcome };
  Crashed: { readonly message: string };
}>;

export const CycleResult = Data.taggedEnum<CycleResult>();

const logPipelineFailure = (outcome: RunOutcome) =>
  Effect.gen(function* () {
    if (outcome.durationExceeded) {
      yield* Effect.logError(
        `Pipeline timed out after ${outcome.durationMs}ms and was terminated`
      );
    } else {
      yield* Effect.logError(`Pipeline failed (exit code ${outcome.exitCode})`);
    }
    for (const line of outcome.stderrTail) {
      yield* Effect.logError(`stderr: ${line}`);
    }
  });

/**
 * One pass of list → classify → execute → persist.
 */
export class CycleService extends Effect.Service<CycleService>()("CycleService", {
  effect: Effect.gen(function* () {
    const config = yield* loadAppConfig;
    const drive = yield* DriveService;
    const history = yield* HistoryStore;
    const runner = yield* PipelineRunner;

    const rules: ClassificationRules = {
      excludedMarkers: config.monitor.answerKeyMarkers,
      allowedExtensions: config.monitor.allowedExtensions,
    };

    const execute = (cycle: number): Effect.Effect<CycleResult> =>
      Effect.gen(function* () {
        yield* Effect.logInfo(`=== Check #${cycle} ===`);

        const listing = yield* Effect.either(drive.listFolder(config.drive.folderId));
        if (Either.isLeft(listing)) {
          yield* Effect.logError(`Skipping cycle: ${listing.left.message}`);
          return CycleResult.ListingFailed({ error: listing.left });
        }

        const items = listing.right;
        if (items.length === 0) {
          yield* Effect.logWarning("No files found in the watched folder");
        } else {
          yield* Effect.logInfo(`Files in folder: ${items.length}`);
        }

        const snapshot = yield* history.snapshot;
        const batch = classify(items, snapshot, rules);

        if (batch.length === 0) {
          const known = items.filter((item) => snapshot.processedIds.has(item.id)).length;
          yield* Effect.logInfo("No new answer cards").pipe(
            Effect.annotateLogs({ known, listed: items.length })
          );
          yield* history.touch;
          return CycleResult.Empty({ listed: items.length, known });
        }

        yield* Effect.logInfo(`Found ${batch.length} new answer cards`);
        for (const item of batch) {
          yield* Effect.logInfo(`  -> ${item.name}`);
        }

        const outcome = yield* runner.run(batch);

        if (!outcome.succeeded) {
          yield* logPipelineFailure(outcome);
          yield* Effect.logWarning(`${batch.length} cards left unrecorded for retry`);
          return CycleResult.PipelineFailed({ batchSize: batch.length, outcome });
        }

        yield* Effect.logInfo(`Pipeline succeeded in ${outcome.durationMs}ms`);
        for (const line of outcome.stdoutTail) {
          yield* Effect.logInfo(`stdout: ${line}`);
        }

        const committed = yield* history.commit(batch.map((item) => item.id));
        yield* Effect.logInfo(`Recorded ${batch.length} cards as processed`).pipe(
          Effect.annotateLogs({ processed: committed.processedIds.size })
        );
        return CycleResult.Committed({ committed: batch.length, outcome });
      }).pipe(
        Effect.catchAllDefect((defect) =>
          Effect.logError(`Cycle crashed: ${String(defect)}`).pipe(
            Effect.as(CycleResult.Crashed({ message: String(defect) }))
          )
        ),
        Effect.annotateLogs("cycle", cycle)
      );

    return { execute };
  }),
  dependencies: [DriveService.Default, HistoryStore.Default, PipelineRunner.Default],
}) {}
