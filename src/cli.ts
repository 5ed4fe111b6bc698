#!/usr/bin/env node
import { version } from "../package.json";
import { ReportConfig } from "./types";
import { USAGE, parseArgs, resolveConfig } from "./config";
import { ConfigurationError, errorMessage } from "./errors";
import { TreeScanner } from "./scanner/TreeScanner";
import { aggregate } from "./aggregate/Aggregator";
import { buildReport } from "./report/Reporter";
import { renderItemDump, renderReport } from "./report/renderers";

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

/**
 * Scan, aggregate and render according to the configuration.
 * Rendering completes before anything is returned, so a failure leaves no
 * partial output.
 */
export async function generateOutput(
  config: Readonly<ReportConfig>,
  scanner: TreeScanner = new TreeScanner(),
): Promise<string> {
  const { root, items, skipped } = await scanner.scan(config.directory);

  if (skipped.length > 0) {
    console.error(
      `⚠️ Skipped ${skipped.length} unreadable ${skipped.length === 1 ? "entry" : "entries"}`,
    );
  }

  aggregate(items, root);

  if (config.dumpItems) {
    return renderItemDump(items);
  }
  return renderReport(buildReport(items, config), config.outputFormat);
}

/**
 * Run the command line tool
 *
 * @param argv - Arguments after the node binary and script path
 * @returns Process exit code
 */
export async function run(
  argv: string[],
  scanner?: TreeScanner,
): Promise<number> {
  let config: Readonly<ReportConfig>;
  try {
    const command = parseArgs(argv);
    if (command.kind === "help") {
      console.log(USAGE);
      return ExitCodes.SUCCESS;
    }
    if (command.kind === "version") {
      console.log(version);
      return ExitCodes.SUCCESS;
    }
    config = await resolveConfig(command.options);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      console.error("Run with --help for usage.");
      return ExitCodes.USAGE;
    }
    throw error;
  }

  try {
    const output = await generateOutput(config, scanner);
    console.log(output);
    return ExitCodes.SUCCESS;
  } catch (error: unknown) {
    console.error(`❌ ${errorMessage(error)}`);
    return ExitCodes.FAILURE;
  }
}

// Run when this file is called directly
if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("❌ Fatal error:", errorMessage(error));
      process.exitCode = ExitCodes.FAILURE;
    });
}
