import * as NodeFs from "node:fs/promises";
import * as NodePath from "node:path";
import { Clock, Data, Effect, Ref, Schema } from "effect";
import { loadAppConfig } from "../config";
import { type HistoryFile, HistoryFileJson, type HistorySnapshot } from "../core/schema";

export class PersistenceError extends Data.TaggedError("PersistenceError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export interface HistoryStoreShape {
  /** Re-reads the file and merges it into the in-memory snapshot. */
  readonly load: Effect.Effect<HistorySnapshot>;
  readonly snapshot: Effect.Effect<HistorySnapshot>;
  readonly commit: (ids: Iterable<string>) => Effect.Effect<HistorySnapshot>;
  readonly touch: Effect.Effect<HistorySnapshot>;
  readonly flush: Effect.Effect<void>;
}

export const emptySnapshot: HistorySnapshot = {
  lastCheckedAt: null,
  checkCount: 0,
  processedIds: new Set<string>(),
};

/**
 * Adds ids to the snapshot and counts one more check. Returns a new snapshot.
 */
export const recordCheck = (
  snapshot: HistorySnapshot,
  ids: Iterable<string>,
  timestamp: string
): HistorySnapshot => {
  const processedIds = new Set(snapshot.processedIds);
  for (const id of ids) {
    processedIds.add(id);
  }
  return {
    lastCheckedAt: timestamp,
    checkCount: snapshot.checkCount + 1,
    processedIds,
  };
};

export const mergeSnapshots = (
  current: HistorySnapshot,
  stored: HistorySnapshot
): HistorySnapshot => {
  const processedIds = new Set(current.processedIds);
  for (const id of stored.processedIds) {
    processedIds.add(id);
  }
  const lastCheckedAt =
    current.lastCheckedAt !== null &&
    (stored.lastCheckedAt === null || current.lastCheckedAt > stored.lastCheckedAt)
      ? current.lastCheckedAt
      : stored.lastCheckedAt;
  return {
    lastCheckedAt,
    checkCount: Math.max(current.checkCount, stored.checkCount),
    processedIds,
  };
};

export const toHistoryFile = (snapshot: HistorySnapshot): HistoryFile => ({
  ultima_verificacao: snapshot.lastCheckedAt,
  total_verificacoes: snapshot.checkCount,
  arquivos_processados: [...snapshot.processedIds],
});

export const fromHistoryFile = (file: HistoryFile): HistorySnapshot => ({
  lastCheckedAt: file.ultima_verificacao,
  checkCount: file.total_verificacoes,
  processedIds: new Set(file.arquivos_processados),
});

const currentTimestamp = Clock.currentTimeMillis.pipe(
  Effect.map((millis) => new Date(millis).toISOString())
);

export const readHistoryFile = (filePath: string): Effect.Effect<HistorySnapshot> =>
  Effect.tryPromise({
    try: async () => await NodeFs.readFile(filePath, "utf-8"),
    catch: (error) =>
      new PersistenceError({
        message: error instanceof Error ? error.message : "Failed to read history file",
        cause: error,
      }),
  }).pipe(
    Effect.flatMap((content) =>
      Schema.decodeUnknown(HistoryFileJson)(content).pipe(
        Effect.mapError(
          (error) =>
            new PersistenceError({
              message: `Unparsable history file ${filePath}: ${error.message}`,
              cause: error,
            })
        )
      )
    ),
    Effect.map(fromHistoryFile),
    Effect.catchAll((error) =>
      Effect.logWarning(`Starting from empty history: ${error.message}`).pipe(
        Effect.as(emptySnapshot)
      )
    )
  );

/**
 * Rewrites the whole file through a temporary sibling and a rename, so a crash
 * leaves either the previous file or the new one.
 */
export const writeHistoryFile = (
  filePath: string,
  snapshot: HistorySnapshot
): Effect.Effect<void, PersistenceError> => {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  const serialized = JSON.stringify(toHistoryFile(snapshot), null, 2);

  return Effect.tryPromise({
    try: async () => {
      await NodeFs.mkdir(NodePath.dirname(filePath), { recursive: true });
      await NodeFs.writeFile(tempPath, serialized, "utf-8");
      await NodeFs.rename(tempPath, filePath);
    },
    catch: (error) =>
      new PersistenceError({
        message: error instanceof Error ? error.message : "Failed to write history file",
        cause: error,
      }),
  }).pipe(Effect.uninterruptible);
};

export const makeHistoryStore = (filePath: string): Effect.Effect<HistoryStoreShape> =>
  Effect.gen(function* () {
    const initial = yield* readHistoryFile(filePath);
    const ref = yield* Ref.make(initial);

    yield* Effect.logDebug(`History loaded from ${filePath}`).pipe(
      Effect.annotateLogs({ processed: initial.processedIds.size, checks: initial.checkCount })
    );

    const persist = (snapshot: HistorySnapshot) =>
      writeHistoryFile(filePath, snapshot).pipe(
        Effect.catchAll((error) =>
          Effect.logError(`Failed to persist history, keeping it in memory: ${error.message}`)
        )
      );

    const load = Effect.gen(function* () {
      const stored = yield* readHistoryFile(filePath);
      return yield* Ref.updateAndGet(ref, (current) => mergeSnapshots(current, stored));
    });

    const commit = (ids: Iterable<string>) =>
      Effect.gen(function* () {
        const timestamp = yield* currentTimestamp;
        const next = yield* Ref.updateAndGet(ref, (current) =>
          recordCheck(current, ids, timestamp)
        );
        yield* persist(next);
        return next;
      }).pipe(Effect.uninterruptible);

    const flush = Effect.gen(function* () {
      const snapshot = yield* Ref.get(ref);
      yield* persist(snapshot);
    }).pipe(Effect.uninterruptible);

    return {
      load,
      snapshot: Ref.get(ref),
      commit,
      touch: commit([]),
      flush,
    };
  });

export class HistoryStore extends Effect.Service<HistoryStore>()("HistoryStore", {
  effect: Effect.gen(function* () {
    const config = yield* loadAppConfig;
    return yield* makeHistoryStore(config.monitor.historyFile);
  }),
  dependencies: [],
}) {}
