#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommands } from "./modules/download.js";
import { renderError } from "./lib/errors/renderer.js";

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageSchema.parse(JSON.parse(raw)).version;
}

export async function main(argv = process.argv): Promise<void> {
  const program = new Command()
    .name("bucket-fetch")
    .description("Concurrent downloads from S3-compatible object storage")
    .version(readVersion());

  registerDownloadCommands(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderError(error, argv.includes("--json") ? "json" : "text");
    process.exitCode = 1;
  }
}

void main();
