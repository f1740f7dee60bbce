/**
 * epub-locate CLI
 *
 * Finds the first occurrence of a text query in an EPUB and prints where it is.
 */

import { Command } from "commander";
import * as path from "node:path";
import { locateInEpub } from "./epub-locate";
import { EpubLocateError } from "./errors";
import { formatReport, toJson } from "./report";

export type CliOptions = {
  json?: boolean;
  verbose?: boolean;
  tempDir?: string;
};

type Output = Pick<Console, "log" | "error">;

export const EXIT_FOUND = 0;
export const EXIT_ERROR = 1;
export const EXIT_NOT_FOUND = 2;

export async function runLocate(
  archive: string,
  query: string,
  options: CliOptions,
  output: Output = console,
): Promise<number> {
  try {
    const result = await locateInEpub(path.resolve(process.cwd(), archive), query, {
      tempDir: options.tempDir ? path.resolve(process.cwd(), options.tempDir) : undefined,
      verbose: options.verbose,
    });

    output.log(options.json ? JSON.stringify(toJson(result), null, 2) : formatReport(result));
    return result.status === "found" ? EXIT_FOUND : EXIT_NOT_FOUND;
  } catch (error) {
    if (error instanceof EpubLocateError) {
      output.error(`error [${error.code}]: ${error.message}`);
      return EXIT_ERROR;
    }
    throw error;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("epub-locate")
    .description("Locate a text query in an EPUB and print its structural address")
    .version("0.1.0")
    .argument("<archive>", "Path to the .epub file")
    .argument("<query>", "Text to find, matched literally within a single text node")
    .option("--json", "Print the result as JSON")
    .option("-v, --verbose", "Log progress while staging and scanning")
    .option("--temp-dir <dir>", "Directory in which to create the staging area")
    .action(async (archive: string, query: string) => {
      process.exitCode = await runLocate(archive, query, program.opts<CliOptions>());
    });

  return program;
}
