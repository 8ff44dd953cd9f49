import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

vi.mock("../lib/config.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../lib/config.js")>();
  return {
    ...actual,
    loadConfig: vi.fn(),
    loadStorageEnv: vi.fn(),
  };
});

import {
  buildContracts,
  parseWorkers,
  registerDownloadCommands,
  runDownload,
  type DownloadDeps,
} from "./download.js";
import { loadConfig, loadStorageEnv, type ResolvedConfig } from "../lib/config.js";
import { createContractFactory } from "../lib/contract.js";
import { createNoopLogger } from "../lib/logger.js";
import { silentProgressSink } from "../lib/adapters/log-progress-sink.js";
import { createFakeStorage, type FakeObject } from "../lib/__fixtures__/fake-storage.js";

const RESOLVED: ResolvedConfig = {
  workers: 2,
  progressIntervalMs: 2000,
  pollTimeoutMs: 10,
  joinTimeoutMs: 1000,
  failurePolicy: "mark-failed",
  storageConfigPath: "storage.conf",
  logLevel: "error",
  logJson: false,
};

const STORAGE_ENV = {
  SPACES_NAME: "media",
  ACCESS_KEY: "test-access",
  SECRET_KEY: "test-secret",
  REGION_NAME: "nyc3",
};

function testDeps(objects: Record<string, FakeObject>) {
  const storage = createFakeStorage(objects);
  const signalHandler = { onShutdown: vi.fn(), removeAll: vi.fn() };
  const createClientFactory = vi.fn(() => storage.factory);
  const deps: DownloadDeps = {
    createClientFactory,
    signalHandler,
    sink: silentProgressSink,
    logger: createNoopLogger(),
  };
  return { deps, storage, signalHandler, createClientFactory };
}

describe("download", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    vi.mocked(loadConfig).mockReset().mockReturnValue({ config: RESOLVED, sources: [] });
    vi.mocked(loadStorageEnv).mockReset().mockReturnValue(STORAGE_ENV);
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    process.exitCode = undefined;
  });

  describe("parseWorkers", () => {
    it("leaves the setting alone when the flag is absent", () => {
      expect(parseWorkers(undefined)).toBeUndefined();
    });

    it("parses a valid count", () => {
      expect(parseWorkers("8")).toBe(8);
    });

    it.each(["0", "2.5", "abc", "33"])("rejects %s", (value) => {
      expect(() => parseWorkers(value)).toThrow("Invalid value for workers");
    });
  });

  describe("buildContracts", () => {
    it("maps each key to a destination under the output directory", () => {
      let n = 0;
      const factory = createContractFactory("media", () => `c${++n}`);

      const contracts = buildContracts(factory, ["a.txt", "dir/b.bin"], "/out", {
        VersionId: "v1",
      });

      expect(contracts).toEqual([
        { id: "c1", bucket: "media", key: "a.txt", destination: "/out/a.txt", options: { VersionId: "v1" } },
        { id: "c2", bucket: "media", key: "dir/b.bin", destination: "/out/dir/b.bin", options: { VersionId: "v1" } },
      ]);
    });
  });

  describe("runDownload", () => {
    it("downloads every key and reports a JSON summary", async () => {
      const { deps, storage, signalHandler, createClientFactory } = testDeps({
        "a.txt": { size: 10 },
        "dir/b.bin": { size: 20, chunks: [10, 10] },
      });

      const summary = await runDownload(
        ["a.txt", "dir/b.bin"],
        { outputDir: "/out", workers: "2", json: true },
        deps
      );

      expect(summary).toEqual({
        bucket: "media",
        total: 2,
        complete: 2,
        failed: 0,
        incomplete: 0,
        notStarted: 0,
        failures: [],
      });
      expect(loadConfig).toHaveBeenCalledWith(undefined, {
        workers: 2,
        storageConfigPath: undefined,
        logJson: true,
      });
      expect(createClientFactory).toHaveBeenCalledWith(
        {
          bucket: "media",
          accessKeyId: "test-access",
          secretAccessKey: "test-secret",
          region: "nyc3",
        },
        deps.logger
      );
      expect(storage.created).toEqual([0, 1]);
      expect(signalHandler.onShutdown).toHaveBeenCalledTimes(1);
      expect(signalHandler.removeAll).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify(summary));
    });

    it("uses the bucket given on the command line", async () => {
      const { deps } = testDeps({ "a.txt": { size: 1 } });

      const summary = await runDownload(
        ["a.txt"],
        { outputDir: "/out", bucket: "archive", json: true },
        deps
      );

      expect(summary.bucket).toBe("archive");
    });

    it("lists failed downloads in the text summary", async () => {
      const { deps } = testDeps({
        good: { size: 4 },
        broken: { size: 4, failAfterChunks: 0 },
      });

      const summary = await runDownload(["good", "broken"], { outputDir: "/out" }, deps);

      expect(summary.complete).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.failures).toEqual([
        expect.objectContaining({ key: "broken", code: "TRANSFER_FAILED" }),
      ]);
      expect(consoleLogSpy).toHaveBeenCalledWith("Downloaded 1/2 from media");
      expect(consoleLogSpy).toHaveBeenCalledWith("  failed:      1");
    });

    it("fails before submitting anything when credentials are missing", async () => {
      vi.mocked(loadStorageEnv).mockReturnValue({});
      const { deps, createClientFactory } = testDeps({});

      await expect(runDownload(["a.txt"], { outputDir: "/out" }, deps)).rejects.toMatchObject({
        code: "CONFIG_INCOMPLETE",
        message: "Storage configuration is missing SPACES_NAME, ACCESS_KEY, SECRET_KEY, REGION_NAME",
      });
      expect(createClientFactory).not.toHaveBeenCalled();
    });

    it("requires at least one key", async () => {
      const { deps } = testDeps({});

      await expect(runDownload([], { outputDir: "/out" }, deps)).rejects.toMatchObject({
        code: "VALIDATION_MISSING_ARG",
      });
    });
  });

  describe("command", () => {
    it("renders the error and sets the exit code when setup fails", async () => {
      vi.mocked(loadStorageEnv).mockReturnValue({});
      const program = new Command();
      program.exitOverride();
      registerDownloadCommands(program);

      await program.parseAsync(["node", "test", "download", "a.txt", "--json"]);

      expect(process.exitCode).toBe(1);
      const rendered = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(rendered).toMatchObject({ error: true, code: "CONFIG_INCOMPLETE" });
    });
  });
});
