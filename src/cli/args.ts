import path from "node:path";
import { DEFAULT_CONFIG_FILE } from "../generator/config/generator_config.js";

export interface Options {
  config: string;
  dump: boolean;
  verbose: boolean;
  help: boolean;
}

export function parseArgs(argv: string[], cwd: string = process.cwd()): Options {
  const opts: Options = {
    config: path.join(cwd, DEFAULT_CONFIG_FILE),
    dump: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-c" || arg === "--config") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -c/--config");
      opts.config = path.resolve(cwd, value);
      i += 1;
      continue;
    }
    if (arg === "--dump") {
      opts.dump = true;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

export const HELP_TEXT = `Usage: node-marker-codegen [options]

Generates node marker components, the marker dispatcher and the script-side
classifier from the engine's reflection dump.

Options:
  -c, --config <path>   Generator config (default: ./${DEFAULT_CONFIG_FILE})
  --dump                Export a fresh reflection dump from the engine first
  -v, --verbose         Verbose logging
  -h, --help            Show this help
`;
