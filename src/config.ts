import fs from "fs-extra";
import path from "path";
import { OUTPUT_FORMATS, OutputFormat, ReportConfig } from "./types";
import { ConfigurationError, errorMessage } from "./errors";

export const DEFAULT_CONFIG: Readonly<ReportConfig> = {
  directory: ".",
  top: 20,
  outputFormat: "text",
  dumpItems: false,
};

export const USAGE = `Usage: dirsize-report [options] [directory]

Scan a directory tree and report its largest files and directories.

Arguments:
  directory                  Directory to scan (default: ".")

Options:
  --top N                    Entries per ranked list (default: ${DEFAULT_CONFIG.top})
  --output-format FORMAT     One of: ${OUTPUT_FORMATS.join(", ")} (default: ${DEFAULT_CONFIG.outputFormat})
  --dump-items               Print every scanned item as JSON instead of the report
  -v, --version              Print the version and exit
  -h, --help                 Print this help and exit`;

/**
 * Result of reading the command line
 */
export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; options: ReportConfig };

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function parseTop(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ConfigurationError(
      `Invalid --top value: ${value ?? "(missing)"}. Expected a positive integer`,
    );
  }
  const top = Number.parseInt(value, 10);
  if (top < 1) {
    throw new ConfigurationError(
      `Invalid --top value: ${value}. Expected a positive integer`,
    );
  }
  return top;
}

function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || !isOutputFormat(value)) {
    throw new ConfigurationError(
      `Invalid --output-format value: ${value ?? "(missing)"}. Valid choices: ${OUTPUT_FORMATS.join(", ")}`,
    );
  }
  return value;
}

const BOOLEAN_FLAGS = ["--help", "--version", "--dump-items"];

// "--top=5" -> { flag: "--top", inlineValue: "5" }
function splitFlag(arg: string): { flag: string; inlineValue?: string } {
  const equals = arg.indexOf("=");
  if (!arg.startsWith("--") || equals === -1) {
    return { flag: arg };
  }
  return { flag: arg.slice(0, equals), inlineValue: arg.slice(equals + 1) };
}

/**
 * Parse command line arguments (without the node and script entries).
 * The directory is returned as given; see resolveConfig.
 */
export function parseArgs(argv: string[]): CliCommand {
  let directory: string | undefined;
  let top = DEFAULT_CONFIG.top;
  let outputFormat = DEFAULT_CONFIG.outputFormat;
  let dumpItems = DEFAULT_CONFIG.dumpItems;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const { flag, inlineValue } = splitFlag(arg);

    if (inlineValue !== undefined && BOOLEAN_FLAGS.includes(flag)) {
      throw new ConfigurationError(`Option ${flag} does not take a value`);
    }

    if (flag === "--help" || flag === "-h") {
      return { kind: "help" };
    }

    if (flag === "--version" || flag === "-v") {
      return { kind: "version" };
    }

    if (flag === "--top") {
      top = parseTop(inlineValue ?? argv[++i]);
      continue;
    }

    if (flag === "--output-format") {
      outputFormat = parseOutputFormat(inlineValue ?? argv[++i]);
      continue;
    }

    if (flag === "--dump-items") {
      dumpItems = true;
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }

    if (directory !== undefined) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }
    directory = arg;
  }

  return {
    kind: "run",
    options: {
      directory: directory ?? DEFAULT_CONFIG.directory,
      top,
      outputFormat,
      dumpItems,
    },
  };
}

/**
 * Check that the target directory exists and freeze the configuration.
 * A symlinked root is replaced by the directory it points to.
 */
export async function resolveConfig(
  options: ReportConfig,
): Promise<Readonly<ReportConfig>> {
  let directory = path.resolve(options.directory);

  let isDirectory = false;
  try {
    if (await fs.pathExists(directory)) {
      directory = await fs.realpath(directory);
      isDirectory = (await fs.stat(directory)).isDirectory();
    }
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Cannot access ${options.directory}: ${errorMessage(error)}`,
    );
  }

  if (!isDirectory) {
    throw new ConfigurationError(`Not a directory: ${options.directory}`);
  }

  return Object.freeze({ ...options, directory });
}
