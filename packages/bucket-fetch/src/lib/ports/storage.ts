/**
 * Progress callback invoked with the number of newly received bytes.
 */
export type ProgressCallback = (newBytes: number) => void;

export interface DownloadRequest {
  bucket: string;
  key: string;
  /** Local file path to write to */
  destination: string;
  /** Extra request options (version id, SSE-C keys, ...) */
  options: Readonly<Record<string, string>>;
  onProgress: ProgressCallback;
}

/**
 * Abstraction over the object store.
 * One instance per Connection; instances are never shared.
 */
export interface StorageClient {
  /** Content length of the object in bytes */
  headObject(bucket: string, key: string): Promise<number>;
  /** Stream the object to `destination`, reporting each chunk */
  download(request: DownloadRequest): Promise<void>;
}

/**
 * Builds a fresh client for the connection at `index`.
 */
export type StorageClientFactory = (index: number) => StorageClient;
