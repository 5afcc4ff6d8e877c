#!/usr/bin/env node
import path from "node:path";
import { MarkerGenerator } from "../generator/batch/generation_pipeline.js";
import { formatSummary } from "../generator/batch/summary.js";
import { describeError } from "../generator/errors/generator_errors.js";
import { HELP_TEXT, type Options, parseArgs } from "./args.js";

function main(): void {
  let opts: Options;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(describeError(err));
    console.log(HELP_TEXT);
    process.exit(1);
  }

  if (opts.help) {
    console.log(HELP_TEXT);
    return;
  }

  const generator = new MarkerGenerator();
  try {
    const result = generator.generate({
      configPath: opts.config,
      dump: opts.dump,
      verbose: opts.verbose,
    });
    for (const warning of result.warnings) {
      if (opts.verbose || warning.code !== "UnknownClassInOverrideTable") {
        console.warn(`warning: ${warning.format()}`);
      }
    }
    console.log(formatSummary(result, path.dirname(opts.config)));
  } catch (err) {
    console.error("Generation failed:");
    console.error(describeError(err));
    process.exitCode = 1;
  }
}

main();
