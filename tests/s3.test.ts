import { describe, it, expect, vi } from "vitest";
import type { ListObjectsV2Command, ListObjectsV2CommandOutput } from "@aws-sdk/client-s3";
import { AuthError, NotFoundError } from "../src/server/errors.js";
import {
  createS3Gateway,
  s3GatewayFactory,
  stripEtagQuotes,
  toObjectRecord,
  type ListObjectsClient,
} from "../src/server/s3.js";
import { TEST_BUCKET, TEST_CONNECTION } from "./test-utils.js";

const output = (fields: Omit<ListObjectsV2CommandOutput, "$metadata">): ListObjectsV2CommandOutput => ({
  $metadata: {},
  ...fields,
});

const createStubClient = (responses: Array<ListObjectsV2CommandOutput | Error>) => {
  const commands: ListObjectsV2Command[] = [];
  const client = {
    send: vi.fn(
      async (
        command: ListObjectsV2Command,
        _options?: { abortSignal?: AbortSignal },
      ): Promise<ListObjectsV2CommandOutput> => {
        commands.push(command);
        const next = responses.shift();

        if (!next) {
          throw new Error("No stubbed response left");
        }

        if (next instanceof Error) {
          throw next;
        }

        return next;
      },
    ),
    destroy: vi.fn(),
  } satisfies ListObjectsClient;

  return { client, commands };
};

describe("s3", () => {
  describe("toObjectRecord", () => {
    it("should map listing entries to records", () => {
      expect(
        toObjectRecord({
          Key: "reports/q1.csv",
          Size: 512,
          LastModified: new Date("2024-03-01T12:00:00.000Z"),
          ETag: '"abc123"',
          StorageClass: "GLACIER",
        }),
      ).toEqual({
        key: "reports/q1.csv",
        size: 512,
        lastModified: "2024-03-01T12:00:00.000Z",
        etag: "abc123",
        storageClass: "GLACIER",
      });
    });

    it("should fill in defaults for missing fields", () => {
      expect(toObjectRecord({ Key: "empty.txt" })).toEqual({
        key: "empty.txt",
        size: 0,
        lastModified: "",
        etag: "",
        storageClass: "STANDARD",
      });
    });

    it("should skip entries without a key", () => {
      expect(toObjectRecord({ Size: 10 })).toBeNull();
    });

    it("should strip surrounding quotes only", () => {
      expect(stripEtagQuotes('"a"b"')).toBe('a"b');
    });
  });

  describe("createS3Gateway", () => {
    it("should request one page with the continuation token", async () => {
      const { client, commands } = createStubClient([
        output({
          Contents: [{ Key: "a.txt", Size: 1 }, { Size: 2 }, { Key: "b.txt", Size: 3 }],
          IsTruncated: true,
          NextContinuationToken: "token-2",
        }),
      ]);
      const gateway = createS3Gateway(client, { ...TEST_CONNECTION, prefix: "logs/" }, { pageCapacity: 500 });

      const page = await gateway.fetchPage("token-1", new AbortController().signal);

      expect(commands[0].input).toEqual({
        Bucket: TEST_BUCKET,
        Prefix: "logs/",
        ContinuationToken: "token-1",
        MaxKeys: 500,
      });
      expect(page.records.map((record) => record.key)).toEqual(["a.txt", "b.txt"]);
      expect(page.nextToken).toBe("token-2");
      expect(page.hasMore).toBe(true);
    });

    it("should hand the abort signal to the client", async () => {
      const { client } = createStubClient([output({ IsTruncated: false })]);
      const gateway = createS3Gateway(client, TEST_CONNECTION, { pageCapacity: 1000 });
      const controller = new AbortController();

      await gateway.fetchPage(undefined, controller.signal);

      expect(client.send.mock.calls[0][1]?.abortSignal).toBe(controller.signal);
    });

    it("should omit an empty prefix", async () => {
      const { client, commands } = createStubClient([output({ IsTruncated: false })]);
      const gateway = createS3Gateway(client, { ...TEST_CONNECTION, prefix: "" }, { pageCapacity: 1000 });

      const page = await gateway.fetchPage(undefined, new AbortController().signal);

      expect(commands[0].input.Prefix).toBeUndefined();
      expect(commands[0].input.ContinuationToken).toBeUndefined();
      expect(page).toEqual({ records: [], nextToken: undefined, hasMore: false });
    });

    it("should not report more pages without a continuation token", async () => {
      const { client } = createStubClient([output({ Contents: [{ Key: "a.txt" }], IsTruncated: true })]);
      const gateway = createS3Gateway(client, TEST_CONNECTION, { pageCapacity: 1000 });

      const page = await gateway.fetchPage(undefined, new AbortController().signal);

      expect(page.hasMore).toBe(false);
    });

    it("should map SDK failures to store errors", async () => {
      const { client } = createStubClient([
        Object.assign(new Error("The specified bucket does not exist"), { name: "NoSuchBucket" }),
      ]);
      const gateway = createS3Gateway(client, TEST_CONNECTION, { pageCapacity: 1000 });

      const failure = gateway.fetchPage(undefined, new AbortController().signal);

      await expect(failure).rejects.toBeInstanceOf(NotFoundError);
      await expect(failure).rejects.toThrow("Bucket 'test-bucket' does not exist.");
    });

    it("should destroy the client on close", () => {
      const { client } = createStubClient([]);
      const gateway = createS3Gateway(client, TEST_CONNECTION, { pageCapacity: 1000 });

      gateway.close?.();

      expect(client.destroy).toHaveBeenCalledTimes(1);
    });
  });

  describe("s3GatewayFactory", () => {
    it("should reject blank credentials before connecting", async () => {
      const open = s3GatewayFactory(
        { ...TEST_CONNECTION, credentials: { accessKeyId: " ", secretAccessKey: "test-secret" } },
        { pageCapacity: 1000 },
      );

      await expect(open()).rejects.toBeInstanceOf(AuthError);
    });

    it("should build a gateway for valid credentials", async () => {
      const gateway = await s3GatewayFactory(TEST_CONNECTION, { pageCapacity: 1000 })();

      expect(typeof gateway.fetchPage).toBe("function");
      gateway.close?.();
    });
  });
});
