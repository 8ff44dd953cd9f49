import { randomUUID } from "crypto";

/**
 * Immutable description of one requested transfer.
 */
export interface Contract {
  readonly id: string;
  readonly bucket: string;
  readonly key: string;
  /** Local path the object is written to */
  readonly destination: string;
  readonly options: Readonly<Record<string, string>>;
}

export interface ContractFactory {
  readonly bucket: string;
  create(key: string, destination: string, options?: Record<string, string>): Contract;
}

/**
 * Create a factory producing contracts for a single bucket.
 * Ids are random UUIDs unless `generateId` is supplied.
 */
export function createContractFactory(
  bucket: string,
  generateId: () => string = randomUUID
): ContractFactory {
  return {
    bucket,
    create(key, destination, options = {}) {
      return Object.freeze({
        id: generateId(),
        bucket,
        key,
        destination,
        options: Object.freeze({ ...options }),
      });
    },
  };
}
