import { parseArgs } from "node:util";
import * as dotenv from "dotenv";
import { Config, ConfigProvider, Data, Effect, Option } from "effect";
import { DEFAULT_RULES } from "./cycle/classify";

export interface AppConfig {
  drive: {
    folderId: string;
    serviceAccountEmail: string;
    serviceAccountPrivateKey: string;
  };
  monitor: {
    intervalMinutes: number;
    historyFile: string;
    answerKeyMarkers: ReadonlyArray<string>;
    allowedExtensions: ReadonlyArray<string>;
  };
  pipeline: {
    command: string;
    args: ReadonlyArray<string>;
    folderFlag: string;
    timeoutSeconds: number;
    workingDirectory: string | undefined;
  };
}

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

const positiveInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: `${name} must be a positive integer`,
      validation: (value) => value > 0,
    })
  );

const stringList = (name: string, fallback: ReadonlyArray<string>) =>
  Config.array(Config.string(), name).pipe(
    Config.map((values) => values.map((v) => v.trim()).filter((v) => v.length > 0)),
    Config.withDefault(fallback)
  );

export const AppConfig = Config.all({
  drive: Config.all({
    folderId: Config.nonEmptyString("DRIVE_FOLDER_ID"),
    serviceAccountEmail: Config.nonEmptyString("GOOGLE_SERVICE_ACCOUNT_EMAIL"),
    serviceAccountPrivateKey: Config.nonEmptyString("GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY").pipe(
      Config.map((key) => key.replace(/\\n/g, "\n"))
    ),
  }),
  monitor: Config.all({
    intervalMinutes: positiveInteger("MONITOR_INTERVAL_MINUTES", 5),
    historyFile: Config.string("HISTORY_FILE").pipe(
      Config.withDefault("historico_processados.json")
    ),
    answerKeyMarkers: stringList("ANSWER_KEY_MARKERS", DEFAULT_RULES.excludedMarkers),
    allowedExtensions: stringList("ALLOWED_EXTENSIONS", DEFAULT_RULES.allowedExtensions),
  }),
  pipeline: Config.all({
    command: Config.nonEmptyString("PIPELINE_COMMAND"),
    args: stringList("PIPELINE_ARGS", []),
    folderFlag: Config.string("PIPELINE_FOLDER_FLAG").pipe(Config.withDefault("--drive-folder")),
    timeoutSeconds: positiveInteger("PIPELINE_TIMEOUT_SECONDS", 600),
    workingDirectory: Config.option(Config.nonEmptyString("PIPELINE_WORKDIR")).pipe(
      Config.map(Option.getOrUndefined)
    ),
  }),
});

/**
 * Reads {@link AppConfig}, turning a missing or malformed setting into a
 * {@link ConfigurationError}.
 */
export const loadAppConfig: Effect.Effect<AppConfig, ConfigurationError> = Effect.gen(
  function* () {
    return yield* AppConfig;
  }
).pipe(
  Effect.mapError(
    (cause) =>
      new ConfigurationError({
        message: `Invalid configuration: ${String(cause)}`,
        cause,
      })
  )
);

export interface CliArgs {
  readonly intervalMinutes: string | undefined;
  readonly test: boolean;
}

export const parseCliArgs = (args: ReadonlyArray<string>): Effect.Effect<CliArgs, ConfigurationError> =>
  Effect.try({
    try: () => {
      const { values } = parseArgs({
        args: [...args],
        options: {
          interval: { type: "string" },
          test: { type: "boolean", default: false },
          // Flag names used by earlier deployments.
          intervalo: { type: "string" },
          testar: { type: "boolean", default: false },
        },
        strict: true,
        allowPositionals: false,
      });
      return {
        intervalMinutes: values.interval ?? values.intervalo,
        test: (values.test ?? false) || (values.testar ?? false),
      };
    },
    catch: (cause) =>
      new ConfigurationError({
        message: cause instanceof Error ? cause.message : "Invalid command line",
        cause,
      }),
  });

/**
 * Command-line values take precedence; everything else comes from the environment.
 */
export const cliConfigProvider = (cli: CliArgs): ConfigProvider.ConfigProvider => {
  const overrides = new Map<string, string>();
  if (cli.intervalMinutes !== undefined) {
    overrides.set("MONITOR_INTERVAL_MINUTES", cli.intervalMinutes);
  }
  return ConfigProvider.fromMap(overrides).pipe(
    ConfigProvider.orElse(() => ConfigProvider.fromEnv())
  );
};

export const ENV_FILE = ".env";

/**
 * Copies settings from a dotenv file into `process.env` without overriding
 * variables that are already set. A missing file loads nothing.
 * Returns the number of settings read from the file.
 */
export const loadEnvFile = (filePath: string = ENV_FILE): Effect.Effect<number> =>
  Effect.sync(() => dotenv.config({ path: filePath })).pipe(
    Effect.map((result) => Object.keys(result.parsed ?? {}).length)
  );
