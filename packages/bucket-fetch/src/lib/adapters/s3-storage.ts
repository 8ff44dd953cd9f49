import {
  GetObjectCommand,
  HeadObjectCommand,
  S3Client,
  S3ServiceException,
  type GetObjectCommandInput,
  type GetObjectCommandOutput,
} from "@aws-sdk/client-s3";
import { createWriteStream } from "fs";
import { mkdir } from "fs/promises";
import { dirname } from "path";
import { Readable, Writable } from "stream";
import { finished, pipeline } from "stream/promises";
import type { StorageConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { DownloadRequest, StorageClient, StorageClientFactory } from "../ports/storage.js";
import { objectNotFound, storageTransport } from "../errors/catalog.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException && error.$metadata?.httpStatusCode === 404) {
    return true;
  }
  return error instanceof Error && (error.name === "NotFound" || error.name === "NoSuchKey");
}

/**
 * Build the GetObject input, forwarding the request options S3 understands.
 */
export function toGetObjectInput(
  bucket: string,
  key: string,
  options: Readonly<Record<string, string>>,
  logger: Logger
): GetObjectCommandInput {
  const input: GetObjectCommandInput = { Bucket: bucket, Key: key };

  for (const [name, value] of Object.entries(options)) {
    switch (name) {
      case "VersionId":
        input.VersionId = value;
        break;
      case "IfMatch":
        input.IfMatch = value;
        break;
      case "IfNoneMatch":
        input.IfNoneMatch = value;
        break;
      case "SSECustomerAlgorithm":
        input.SSECustomerAlgorithm = value;
        break;
      case "SSECustomerKey":
        input.SSECustomerKey = value;
        break;
      case "SSECustomerKeyMD5":
        input.SSECustomerKeyMD5 = value;
        break;
      case "ExpectedBucketOwner":
        input.ExpectedBucketOwner = value;
        break;
      case "RequestPayer":
        if (value === "requester") {
          input.RequestPayer = value;
        } else {
          logger.debug("Ignoring unsupported RequestPayer value", { value });
        }
        break;
      default:
        logger.debug("Ignoring unsupported download option", { option: name });
    }
  }

  return input;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Writes to the destination file and reports each chunk once the file has
 * accepted it. The latest chunk is held back until the file has finished, so
 * the full size is only reported for a file that was written completely.
 */
function countingFileWriter(destination: string, onProgress: (bytes: number) => void): Writable {
  const file = createWriteStream(destination);
  let held = 0;

  const release = (): Error | undefined => {
    const bytes = held;
    held = 0;
    if (bytes === 0) return undefined;
    try {
      onProgress(bytes);
      return undefined;
    } catch (err) {
      return toError(err);
    }
  };

  const writer = new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      file.write(chunk, (err) => {
        if (err) {
          callback(err);
          return;
        }
        const failure = release();
        held = chunk.length;
        callback(failure);
      });
    },
    final(callback: (error?: Error | null) => void) {
      file.end();
      void finished(file).then(
        () => callback(release()),
        (err: unknown) => callback(toError(err))
      );
    },
    destroy(error: Error | null, callback: (error?: Error | null) => void) {
      file.destroy();
      callback(error);
    },
  });

  file.on("error", (err) => writer.destroy(err));
  return writer;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * Storage client over an S3-compatible endpoint.
 */
export function createS3StorageClient(client: S3Client, logger: Logger): StorageClient {
  async function headObject(bucket: string, key: string): Promise<number> {
    let size: number | undefined;
    try {
      const response = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      size = response.ContentLength;
    } catch (err) {
      throw isNotFound(err) ? objectNotFound(bucket, key, err) : storageTransport("headObject", err);
    }

    if (size === undefined) {
      throw storageTransport("headObject", new Error("Response carried no Content-Length"));
    }
    return size;
  }

  async function download(request: DownloadRequest): Promise<void> {
    const input = toGetObjectInput(request.bucket, request.key, request.options, logger);

    let response: GetObjectCommandOutput;
    try {
      response = await client.send(new GetObjectCommand(input));
    } catch (err) {
      throw isNotFound(err)
        ? objectNotFound(request.bucket, request.key, err)
        : storageTransport("getObject", err);
    }

    const body = response.Body;
    if (!body) {
      throw storageTransport("getObject", new Error("No response body"));
    }

    // Node runtimes always return a Readable; other bodies are buffered.
    const source = body instanceof Readable ? body : Readable.from([await body.transformToByteArray()]);

    await mkdir(dirname(request.destination), { recursive: true });
    await pipeline(source, countingFileWriter(request.destination, request.onProgress));

    logger.debug("Object written", { key: request.key, destination: request.destination });
  }

  return { headObject, download };
}

/**
 * Factory handing each connection its own S3Client.
 */
export function createS3ClientFactory(config: StorageConfig, logger: Logger): StorageClientFactory {
  return (index) =>
    createS3StorageClient(
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
      }),
      logger.child({ component: "s3", connection: index })
    );
}
