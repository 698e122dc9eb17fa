import { FetchHttpClient, HttpClient, HttpClientRequest } from "@effect/platform";
import { Data, Effect, Schema } from "effect";
import { JWT } from "google-auth-library";
import { loadAppConfig } from "../config";
import type { RemoteItem } from "../core/schema";

const DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
const DRIVE_SCOPE = "https://www.googleapis.com/auth/drive.readonly";
const PAGE_SIZE = 100;

// Schemas for the Drive v3 files.list response
class DriveFile extends Schema.Class<DriveFile>("DriveFile")({
  id: Schema.String,
  name: Schema.String,
  mimeType: Schema.String,
  modifiedTime: Schema.optional(Schema.String),
}) {}

class DriveFileList extends Schema.Class<DriveFileList>("DriveFileList")({
  files: Schema.optional(Schema.Array(DriveFile)),
  nextPageToken: Schema.optional(Schema.String),
}) {}

export class GoogleAuthError extends Data.TaggedError("GoogleAuthError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Any failure to obtain the folder listing: auth, quota, transport or a
 * response that does not decode.
 */
export class RemoteError extends Data.TaggedError("RemoteError")<{
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

/**
 * GoogleAuthService - service account tokens for the Drive API via google-auth-library
 */
export class GoogleAuthService extends Effect.Service<GoogleAuthService>()("GoogleAuthService", {
  effect: Effect.gen(function* () {
    const config = yield* loadAppConfig;

    const client = new JWT({
      email: config.drive.serviceAccountEmail,
      key: config.drive.serviceAccountPrivateKey,
      scopes: [DRIVE_SCOPE],
    });

    const getAccessToken = () =>
      Effect.tryPromise({
        try: async () => {
          const token = await client.getAccessToken();
          if (!token.token) {
            throw new Error("Failed to get access token");
          }
          return token.token;
        },
        catch: (error) =>
          new GoogleAuthError({
            message: error instanceof Error ? error.message : "Authentication failed",
            cause: error,
          }),
      });

    return { getAccessToken };
  }),
  dependencies: [],
}) {}

// Pure utility functions (no Effect needed)
export const buildFolderQuery = (folderId: string): string => {
  const escaped = folderId.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  return `'${escaped}' in parents and trashed = false`;
};

export const toRemoteItem = (file: {
  readonly id: string;
  readonly name: string;
  readonly mimeType: string;
  readonly modifiedTime?: string | undefined;
}): RemoteItem => ({
  id: file.id,
  name: file.name,
  modifiedAt: file.modifiedTime ?? null,
  kind: file.mimeType.startsWith("image/") ? "image" : "document",
});

const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("response" in error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response === "object" && response !== null && "status" in response) {
    return typeof response.status === "number" ? response.status : undefined;
  }
  return undefined;
};

export class DriveService extends Effect.Service<DriveService>()("DriveService", {
  effect: Effect.gen(function* () {
    const authService = yield* GoogleAuthService;
    const baseClient = yield* HttpClient.HttpClient;

    const fetchPage = (folderId: string, pageToken: string | undefined) =>
      Effect.gen(function* () {
        const accessToken = yield* authService.getAccessToken();

        const httpClient = baseClient.pipe(
          HttpClient.filterStatusOk,
          HttpClient.mapRequest(
            HttpClientRequest.setHeaders({
              Authorization: `Bearer ${accessToken}`,
              Accept: "application/json",
            })
          )
        );

        return yield* httpClient
          .get(DRIVE_FILES_URL, {
            urlParams: {
              q: buildFolderQuery(folderId),
              fields: "nextPageToken, files(id, name, mimeType, modifiedTime)",
              pageSize: String(PAGE_SIZE),
              ...(pageToken !== undefined ? { pageToken } : {}),
            },
          })
          .pipe(
            Effect.flatMap((res) => res.json),
            Effect.flatMap(Schema.decodeUnknown(DriveFileList))
          );
      }).pipe(
        Effect.mapError(
          (error) =>
            new RemoteError({
              message: `Failed to list Drive folder ${folderId}: ${error.message}`,
              status: statusOf(error),
              cause: error,
            })
        )
      );

    const listFolder = (folderId: string): Effect.Effect<ReadonlyArray<RemoteItem>, RemoteError> =>
      Effect.gen(function* () {
        const items: RemoteItem[] = [];
        let pageToken: string | undefined;

        do {
          const page = yield* fetchPage(folderId, pageToken);
          for (const file of page.files ?? []) {
            items.push(toRemoteItem(file));
          }
          pageToken = page.nextPageToken;
        } while (pageToken !== undefined);

        yield* Effect.logDebug(`Listed ${items.length} files in Drive folder ${folderId}`);
        return items;
      });

    return { listFolder };
  }),
  dependencies: [GoogleAuthService.Default, FetchHttpClient.layer],
}) {}
