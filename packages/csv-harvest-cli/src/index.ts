#!/usr/bin/env node
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { createProgram } from "./program.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export async function main(argv = process.argv): Promise<void> {
  try {
    initContext(argv);
    await createProgram(readVersion()).parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
