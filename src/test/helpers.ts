import * as NodeFs from "node:fs/promises";
import * as NodeOs from "node:os";
import * as NodePath from "node:path";
import { fileURLToPath } from "node:url";
import { HttpClient, HttpClientError, HttpClientResponse, UrlParams } from "@effect/platform";
import { Effect, Layer, Schedule } from "effect";
import type { RemoteItem, RunOutcome } from "../core/schema";
import { DriveService, GoogleAuthService } from "../drive/client";
import { type TestConfig, createTestConfigProvider } from "./config";

/**
 * Mock response configuration for HttpClient tests.
 */
export interface MockHttpResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Request capture info for testing HTTP calls.
 */
export interface CapturedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  query: URLSearchParams;
}

/**
 * Creates a mock HttpClient that returns configured responses.
 * The handler function receives the request and returns the mock response.
 */
export const createMockHttpClient = (handler: (req: CapturedRequest) => MockHttpResponse) =>
  HttpClient.make((req) =>
    Effect.sync(() => {
      const mockResponse = handler({
        url: req.url,
        method: req.method,
        headers: { ...req.headers },
        query: new URLSearchParams(UrlParams.toString(req.urlParams)),
      });

      const status = mockResponse.status ?? 200;
      const body = mockResponse.body;
      const headers = mockResponse.headers ?? { "Content-Type": "application/json" };

      const responseBody = body !== undefined ? JSON.stringify(body) : "";
      const response = new Response(responseBody, {
        status,
        headers,
      });

      return HttpClientResponse.fromWeb(req, response);
    })
  );

/**
 * Creates a mock HttpClient layer that fails with a network-level error.
 */
export const createNetworkErrorHttpClientLayer = (errorMessage: string) =>
  Layer.succeed(
    HttpClient.HttpClient,
    HttpClient.make((req) =>
      Effect.fail(
        new HttpClientError.RequestError({
          request: req,
          reason: "Transport",
          cause: new Error(errorMessage),
        })
      )
    )
  );

/**
 * Creates a mock HttpClient layer from a handler function.
 */
export const createMockHttpClientLayer = (handler: (req: CapturedRequest) => MockHttpResponse) =>
  Layer.succeed(HttpClient.HttpClient, createMockHttpClient(handler));

/**
 * Creates a test layer for DriveService backed by the given HttpClient layer.
 * google-auth-library must be mocked by the calling test file.
 */
export const createDriveTestLayer = (
  config: TestConfig,
  httpLayer: Layer.Layer<HttpClient.HttpClient>
) => {
  const configLayer = Layer.setConfigProvider(createTestConfigProvider(config));

  return DriveService.DefaultWithoutDependencies.pipe(
    Layer.provide(GoogleAuthService.Default),
    Layer.provide(httpLayer),
    Layer.provide(configLayer)
  );
};

export const createRemoteItem = (
  id: string,
  name: string,
  overrides: Partial<RemoteItem> = {}
): RemoteItem => ({
  id,
  name,
  modifiedAt: "2024-03-01T08:00:00.000Z",
  kind: name.toLowerCase().endsWith(".pdf") ? "document" : "image",
  ...overrides,
});

export const createRunOutcome = (overrides: Partial<RunOutcome> = {}): RunOutcome => ({
  succeeded: true,
  exitCode: 0,
  stdoutTail: [],
  stderrTail: [],
  durationExceeded: false,
  durationMs: 10,
  ...overrides,
});

export const makeTempDir = () =>
  Effect.promise(() => NodeFs.mkdtemp(NodePath.join(NodeOs.tmpdir(), "answer-card-monitor-")));

export const removeDir = (dir: string) =>
  Effect.promise(() => NodeFs.rm(dir, { recursive: true, force: true }));

export const readJsonFile = (filePath: string) =>
  Effect.promise(async (): Promise<unknown> => JSON.parse(await NodeFs.readFile(filePath, "utf-8")));

/**
 * Node script that plays the correction pipeline in subprocess tests.
 */
export const pipelineFixture = fileURLToPath(
  new URL("../pipeline/fixtures/fake-pipeline.mjs", import.meta.url)
);

/**
 * Polls a condition on the live clock until it holds, failing after ten seconds.
 */
export const waitUntil = (condition: () => boolean) =>
  Effect.sync(condition).pipe(
    Effect.repeat({ until: (done) => done, schedule: Schedule.spaced("50 millis") }),
    Effect.timeout("10 seconds")
  );

export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
};

export interface DriveFileFixture {
  id: string;
  name: string;
  mimeType: string;
}

/**
 * A fetch that answers every Drive request with one page of the given files.
 */
export const createDriveFetch =
  (files: ReadonlyArray<DriveFileFixture>): typeof globalThis.fetch =>
  async () =>
    new Response(JSON.stringify({ files }), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    });

/**
 * Settings for the real service graph: the fixture script as the pipeline and
 * the given history file.
 */
export const createLiveConfigEntries = (
  historyFile: string,
  pipelineArgs: ReadonlyArray<string>
): Map<string, string> =>
  new Map([
    ["DRIVE_FOLDER_ID", "test-folder-id"],
    ["GOOGLE_SERVICE_ACCOUNT_EMAIL", "test@example.iam.gserviceaccount.com"],
    ["GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY", "test-private-key"],
    ["HISTORY_FILE", historyFile],
    ["PIPELINE_COMMAND", process.execPath],
    ["PIPELINE_ARGS", [pipelineFixture, ...pipelineArgs].join(",")],
    ["PIPELINE_TIMEOUT_SECONDS", "60"],
  ]);
