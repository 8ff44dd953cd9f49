import type { DownloadRequest, StorageClient, StorageClientFactory } from "../ports/storage.js";

export interface FakeObject {
  size: number;
  /** Chunk sizes reported to onProgress; defaults to one chunk of `size` */
  chunks?: number[];
  /** Make the size probe reject */
  failHead?: boolean;
  /** Reject the download after this many chunks */
  failAfterChunks?: number;
  /** Download waits for this before reporting its last chunk */
  gate?: Promise<void>;
}

export interface FakeStorage {
  factory: StorageClientFactory;
  /** Client index per createClient call */
  created: number[];
  /** "start:<key>@<client>" / "end:<key>@<client>" in order */
  events: string[];
  readonly active: number;
  readonly maxActive: number;
}

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-memory object store standing in for S3 in tests.
 */
export function createFakeStorage(
  objects: Record<string, FakeObject>,
  chunkDelayMs = 1
): FakeStorage {
  const created: number[] = [];
  const events: string[] = [];
  let active = 0;
  let maxActive = 0;

  function createClient(index: number): StorageClient {
    created.push(index);

    return {
      async headObject(_bucket, key) {
        const object = objects[key];
        if (!object) throw new Error(`NotFound: ${key}`);
        if (object.failHead) throw new Error("head request failed");
        return object.size;
      },

      async download(request: DownloadRequest) {
        const object = objects[request.key];
        if (!object) throw new Error(`NotFound: ${request.key}`);

        active++;
        maxActive = Math.max(maxActive, active);
        events.push(`start:${request.key}@${index}`);

        try {
          const chunks = object.chunks ?? [object.size];
          for (let i = 0; i < chunks.length; i++) {
            if (object.failAfterChunks !== undefined && i >= object.failAfterChunks) {
              throw new Error("connection reset");
            }
            if (i === chunks.length - 1 && object.gate) {
              await object.gate;
            }
            await tick(chunkDelayMs);
            request.onProgress(chunks[i]);
          }
          events.push(`end:${request.key}@${index}`);
        } finally {
          active--;
        }
      },
    };
  }

  return {
    factory: createClient,
    created,
    events,
    get active() {
      return active;
    },
    get maxActive() {
      return maxActive;
    },
  };
}

/**
 * A promise plus the function that resolves it.
 */
export function createGate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}
