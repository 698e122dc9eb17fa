import * as Schema from "effect/Schema";

export type RemoteItemKind = "document" | "image";

/**
 * A file in the watched folder, as seen at listing time.
 */
export interface RemoteItem {
  readonly id: string;
  readonly name: string;
  readonly modifiedAt: string | null;
  readonly kind: RemoteItemKind;
}

/**
 * Items selected for one pipeline run, in listing order. Never persisted.
 */
export type Batch = ReadonlyArray<RemoteItem>;

export interface HistorySnapshot {
  readonly lastCheckedAt: string | null;
  readonly checkCount: number;
  readonly processedIds: ReadonlySet<string>;
}

export interface RunOutcome {
  readonly succeeded: boolean;
  readonly exitCode: number;
  readonly stdoutTail: ReadonlyArray<string>;
  readonly stderrTail: ReadonlyArray<string>;
  readonly durationExceeded: boolean;
  readonly durationMs: number;
}

export interface ClassificationRules {
  /** Lower-case substrings that mark a file as an answer key rather than a card. */
  readonly excludedMarkers: ReadonlyArray<string>;
  /** Extensions without the dot, compared case-insensitively. */
  readonly allowedExtensions: ReadonlyArray<string>;
}

/**
 * On-disk history file. Keys keep the names used by existing deployments.
 * Missing keys decode to their empty values.
 */
export const HistoryFile = Schema.Struct({
  ultima_verificacao: Schema.optionalWith(Schema.NullOr(Schema.String), {
    default: () => null,
  }),
  total_verificacoes: Schema.optionalWith(Schema.Number.pipe(Schema.int(), Schema.nonNegative()), {
    default: () => 0,
  }),
  arquivos_processados: Schema.optionalWith(Schema.Array(Schema.String), {
    default: () => [],
  }),
});

export type HistoryFile = typeof HistoryFile.Type;

export const HistoryFileJson = Schema.parseJson(HistoryFile);
