import { Duration, Effect, Ref, Schedule } from "effect";
import { loadAppConfig } from "../config";
import { CycleService } from "../cycle/cycle";
import { HistoryStore } from "../state/store";

/**
 * Monitor scheduler: runs cycles back to back with a fixed pause between the
 * end of one cycle and the start of the next, until interrupted.
 */
export class MonitorService extends Effect.Service<MonitorService>()("MonitorService", {
  effect: Effect.gen(function* () {
    const config = yield* loadAppConfig;
    const cycles = yield* CycleService;
    const history = yield* HistoryStore;

    const cycleCounter = yield* Ref.make(0);
    const interval = Duration.minutes(config.monitor.intervalMinutes);

    const runOnce = Effect.gen(function* () {
      const cycle = yield* Ref.updateAndGet(cycleCounter, (n) => n + 1);
      return yield* cycles.execute(cycle);
    });

    const shutdown = Effect.gen(function* () {
      const cyclesRun = yield* Ref.get(cycleCounter);
      const snapshot = yield* history.snapshot;
      yield* Effect.logInfo("Monitor interrupted, flushing history").pipe(
        Effect.annotateLogs({
          cycles: cyclesRun,
          processed: snapshot.processedIds.size,
          checks: snapshot.checkCount,
        })
      );
      yield* history.flush;
    });

    const runForever = Effect.gen(function* () {
      const snapshot = yield* history.snapshot;
      yield* Effect.logInfo("Answer card monitor started").pipe(
        Effect.annotateLogs({
          folder: config.drive.folderId,
          intervalMinutes: config.monitor.intervalMinutes,
          processed: snapshot.processedIds.size,
        })
      );

      // First cycle runs immediately; the spacing counts from the end of each cycle.
      yield* runOnce.pipe(Effect.repeat(Schedule.spaced(interval)));
    }).pipe(Effect.onInterrupt(() => shutdown));

    return { runOnce, runForever, cycleCount: Ref.get(cycleCounter) };
  }),
  dependencies: [CycleService.Default, HistoryStore.Default],
}) {}
