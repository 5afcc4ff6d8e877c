/**
 * Acquires the reflection dump, exporting it from the engine when asked
 */

import { spawnSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { GeneratorError } from "../errors/generator_errors.js";

export const ENGINE_DUMP_TIMEOUT_MS = 30_000;

export interface ProcessOutcome {
  status: number | null;
  error?: Error;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  timeoutMs: number,
) => ProcessOutcome;

export const spawnProcess: ProcessRunner = (command, args, timeoutMs) => {
  const result = spawnSync(command, args, {
    encoding: "utf8",
    timeout: timeoutMs,
    stdio: "pipe",
  });
  return { status: result.status, error: result.error };
};

export interface SchemaSourceOptions {
  schemaPath: string;
  dump: boolean;
  executables: readonly string[];
  runner?: ProcessRunner;
  verbose?: boolean;
}

export function dumpCommandArgs(schemaPath: string): string[] {
  return ["--headless", "--dump-extension-api", schemaPath];
}

/**
 * Returns the executable that produced the dump, or null when no dump was
 * requested. Whether the file exists is checked when it is loaded.
 */
export function acquireSchema(options: SchemaSourceOptions): string | null {
  if (!options.dump) return null;

  const runner = options.runner ?? spawnProcess;
  const args = dumpCommandArgs(options.schemaPath);
  fs.mkdirSync(path.dirname(options.schemaPath), { recursive: true });

  const failures: string[] = [];
  for (const executable of options.executables) {
    const outcome = runner(executable, args, ENGINE_DUMP_TIMEOUT_MS);
    if (
      outcome.status === 0 &&
      !outcome.error &&
      fs.existsSync(options.schemaPath)
    ) {
      if (options.verbose) {
        console.log(`Exported reflection dump with '${executable}'`);
      }
      return executable;
    }
    const reason = outcome.error
      ? outcome.error.message
      : `exit status ${outcome.status ?? "none"}`;
    failures.push(`${executable}: ${reason}`);
    if (options.verbose) {
      console.warn(`Engine dump with '${executable}' failed (${reason})`);
    }
  }

  const tried =
    failures.length > 0 ? failures.join("; ") : "no executables configured";
  throw new GeneratorError(
    "ExternalToolUnavailable",
    `Could not export the reflection dump (${tried})`,
    {
      filePath: options.schemaPath,
      suggestion: `Install the engine on PATH, or run it yourself: <engine> ${args.join(" ")}`,
    },
  );
}
