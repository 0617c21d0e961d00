import { ListObjectsV2Command, S3Client } from "@aws-sdk/client-s3";
import type { _Object, ListObjectsV2CommandOutput } from "@aws-sdk/client-s3";
import { config } from "./config.js";
import { AuthError, mapStoreError } from "./errors.js";
import { sentryDistributionMetric } from "./observability.js";
import type { ConnectionConfig, ListedPage, ObjectRecord } from "./types.js";

/**
 * A single remote "list objects" call. Implementations never retry; a call
 * either yields one page or rejects with one of the store errors. Aborting
 * `signal` abandons the call in flight.
 */
export interface ObjectStoreGateway {
  fetchPage(continuationToken: string | undefined, signal: AbortSignal): Promise<ListedPage>;
  close?(): void;
}

export type GatewayFactory = () => Promise<ObjectStoreGateway>;

/** The slice of {@link S3Client} the gateway talks to. */
export type ListObjectsClient = {
  send(
    command: ListObjectsV2Command,
    options?: { abortSignal?: AbortSignal },
  ): Promise<ListObjectsV2CommandOutput>;
  destroy(): void;
};

export type S3GatewayOptions = {
  pageCapacity: number;
};

const trackS3Latency = async <T>(
  operation: string,
  run: () => Promise<T>,
  attributes?: Record<string, unknown>,
): Promise<T> => {
  const startedAt = Date.now();

  try {
    const result = await run();
    sentryDistributionMetric(`s3.${operation}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "success",
    });
    return result;
  } catch (error) {
    sentryDistributionMetric(`s3.${operation}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "failure",
    });
    throw error;
  }
};

export const stripEtagQuotes = (etag: string): string => etag.replace(/^"+|"+$/g, "");

export const toObjectRecord = (item: _Object): ObjectRecord | null => {
  if (!item.Key) {
    return null;
  }

  return {
    key: item.Key,
    size: item.Size ?? 0,
    lastModified: item.LastModified?.toISOString() ?? "",
    etag: stripEtagQuotes(item.ETag ?? ""),
    storageClass: item.StorageClass ?? "STANDARD",
  };
};

export const createS3Client = (connection: ConnectionConfig): S3Client => {
  return new S3Client({
    endpoint: connection.endpoint,
    region: connection.region || config.S3_DEFAULT_REGION,
    forcePathStyle: config.S3_FORCE_PATH_STYLE,
    credentials: connection.credentials,
  });
};

export const createS3Gateway = (
  client: ListObjectsClient,
  connection: ConnectionConfig,
  options: S3GatewayOptions,
): ObjectStoreGateway => {
  const { bucket, prefix } = connection;

  return {
    fetchPage: async (continuationToken, signal) => {
      try {
        const response = await trackS3Latency(
          "list_objects_v2",
          () =>
            client.send(
              new ListObjectsV2Command({
                Bucket: bucket,
                Prefix: prefix || undefined,
                ContinuationToken: continuationToken,
                MaxKeys: options.pageCapacity,
              }),
              { abortSignal: signal },
            ),
          {
            bucket,
            has_continuation_token: Boolean(continuationToken),
          },
        );

        const records = (response.Contents ?? [])
          .map(toObjectRecord)
          .filter((record): record is ObjectRecord => record !== null);
        const nextToken = response.NextContinuationToken || undefined;

        return {
          records,
          nextToken,
          hasMore: Boolean(response.IsTruncated) && Boolean(nextToken),
        };
      } catch (error) {
        throw mapStoreError(error, bucket);
      }
    },
    close: () => {
      client.destroy();
    },
  };
};

export const s3GatewayFactory = (
  connection: ConnectionConfig,
  options: S3GatewayOptions,
): GatewayFactory => {
  return async () => {
    const { accessKeyId, secretAccessKey } = connection.credentials;

    if (!accessKeyId.trim() || !secretAccessKey.trim()) {
      throw new AuthError("Invalid credentials. Please check your access key and secret key.");
    }

    return createS3Gateway(createS3Client(connection), connection, options);
  };
};
