import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";

const mockSend = vi.fn();
const clientConfigs: unknown[] = [];

vi.mock("@aws-sdk/client-s3", () => {
  class S3ServiceException extends Error {
    $metadata: { httpStatusCode?: number } = {};
  }
  return {
    S3ServiceException,
    S3Client: class {
      constructor(config: unknown) {
        clientConfigs.push(config);
      }
      send(...args: unknown[]) {
        return mockSend(...args);
      }
    },
    HeadObjectCommand: class {
      constructor(readonly input: unknown) {}
    },
    GetObjectCommand: class {
      constructor(readonly input: unknown) {}
    },
  };
});

import { S3Client } from "@aws-sdk/client-s3";
import {
  createS3ClientFactory,
  createS3StorageClient,
  toGetObjectInput,
} from "./s3-storage.js";
import { createNoopLogger } from "../logger.js";
import { hasErrorCode } from "../errors/types.js";
import { createContractFactory } from "../contract.js";
import { DownloadManager } from "../download-manager.js";

function notFoundError(): Error {
  const error = new Error("not found");
  error.name = "NotFound";
  return error;
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

describe("s3 storage adapter", () => {
  let workDir: string;

  beforeEach(() => {
    mockSend.mockReset();
    clientConfigs.length = 0;
    workDir = mkdtempSync(join(tmpdir(), "bucket-fetch-"));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  const storage = () => createS3StorageClient(new S3Client({}), createNoopLogger());

  describe("headObject", () => {
    it("returns the content length", async () => {
      mockSend.mockResolvedValue({ ContentLength: 2048 });

      await expect(storage().headObject("media", "a.bin")).resolves.toBe(2048);
      expect(mockSend.mock.calls[0][0].input).toEqual({ Bucket: "media", Key: "a.bin" });
    });

    it("maps a missing object to STORAGE_NOT_FOUND", async () => {
      mockSend.mockRejectedValue(notFoundError());

      const error = await captureRejection(storage().headObject("media", "gone.bin"));

      expect(hasErrorCode(error, "STORAGE_NOT_FOUND")).toBe(true);
    });

    it("maps other failures to STORAGE_TRANSPORT", async () => {
      mockSend.mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));

      const error = await captureRejection(storage().headObject("media", "a.bin"));

      expect(hasErrorCode(error, "STORAGE_TRANSPORT")).toBe(true);
    });

    it("treats a missing content length as a transport failure", async () => {
      mockSend.mockResolvedValue({});

      const error = await captureRejection(storage().headObject("media", "a.bin"));

      expect(hasErrorCode(error, "STORAGE_TRANSPORT")).toBe(true);
    });
  });

  describe("download", () => {
    it("streams the body to disk and reports every chunk", async () => {
      mockSend.mockResolvedValue({
        Body: Readable.from([Buffer.from("hello"), Buffer.from(" world")]),
      });
      const destination = join(workDir, "nested", "dir", "out.txt");
      const chunks: number[] = [];

      await storage().download({
        bucket: "media",
        key: "docs/out.txt",
        destination,
        options: { VersionId: "v7" },
        onProgress: (n) => chunks.push(n),
      });

      expect(readFileSync(destination, "utf-8")).toBe("hello world");
      expect(chunks).toEqual([5, 6]);
      expect(mockSend.mock.calls[0][0].input).toEqual({
        Bucket: "media",
        Key: "docs/out.txt",
        VersionId: "v7",
      });
    });

    it("maps a missing object to STORAGE_NOT_FOUND", async () => {
      mockSend.mockRejectedValue(notFoundError());

      const error = await captureRejection(
        storage().download({
          bucket: "media",
          key: "gone.bin",
          destination: join(workDir, "gone.bin"),
          options: {},
          onProgress: () => {},
        })
      );

      expect(hasErrorCode(error, "STORAGE_NOT_FOUND")).toBe(true);
    });

    it("fails when the response has no body", async () => {
      mockSend.mockResolvedValue({});

      const error = await captureRejection(
        storage().download({
          bucket: "media",
          key: "a.bin",
          destination: join(workDir, "a.bin"),
          options: {},
          onProgress: () => {},
        })
      );

      expect(hasErrorCode(error, "STORAGE_TRANSPORT")).toBe(true);
    });
  });

  describe("write failures", () => {
    it("reports no bytes when the destination cannot be written", async () => {
      mockSend.mockResolvedValue({ Body: Readable.from([Buffer.alloc(10)]) });
      const chunks: number[] = [];

      const error = await captureRejection(
        storage().download({
          bucket: "media",
          key: "a.bin",
          // an existing directory cannot be opened as a file
          destination: workDir,
          options: {},
          onProgress: (n) => chunks.push(n),
        })
      );

      expect(error).toMatchObject({ code: "EISDIR" });
      expect(chunks).toEqual([]);
    });

    it("fails the task instead of completing it", async () => {
      mockSend
        .mockResolvedValueOnce({ ContentLength: 10 })
        .mockResolvedValueOnce({ Body: Readable.from([Buffer.alloc(10)]) });

      const manager = new DownloadManager({
        workers: 1,
        createClient: () => storage(),
        logger: createNoopLogger(),
        pollTimeoutMs: 10,
      });
      const task = manager.submit(
        createContractFactory("media", () => "t1").create("a.bin", workDir)
      );

      manager.start();
      await manager.waitForIdle();
      await manager.stop();

      expect(task.state).toBe("failed");
      expect(task.error?.code).toBe("TRANSFER_FAILED");
      expect(manager.completedTasks()).toEqual([]);
      expect(manager.failedTasks()).toEqual([task]);
    });
  });

  describe("toGetObjectInput", () => {
    it("forwards known options and drops the rest", () => {
      const input = toGetObjectInput(
        "media",
        "a.bin",
        { VersionId: "v1", RequestPayer: "requester", Colour: "blue", IfMatch: '"etag"' },
        createNoopLogger()
      );

      expect(input).toEqual({
        Bucket: "media",
        Key: "a.bin",
        VersionId: "v1",
        RequestPayer: "requester",
        IfMatch: '"etag"',
      });
    });

    it("drops an unknown RequestPayer value", () => {
      const input = toGetObjectInput("media", "a.bin", { RequestPayer: "owner" }, createNoopLogger());

      expect(input).toEqual({ Bucket: "media", Key: "a.bin" });
    });
  });

  describe("createS3ClientFactory", () => {
    it("builds a separate S3Client per connection", () => {
      const factory = createS3ClientFactory(
        {
          bucket: "media",
          accessKeyId: "test-access",
          secretAccessKey: "test-secret",
          region: "nyc3",
          endpoint: "https://nyc3.example.test",
        },
        createNoopLogger()
      );

      factory(0);
      factory(1);

      expect(clientConfigs).toHaveLength(2);
      expect(clientConfigs[0]).toEqual({
        region: "nyc3",
        endpoint: "https://nyc3.example.test",
        credentials: { accessKeyId: "test-access", secretAccessKey: "test-secret" },
      });
    });
  });
});
