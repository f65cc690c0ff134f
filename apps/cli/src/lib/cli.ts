import path from "node:path";
import { Command } from "commander";
import { ZodError } from "zod";
import { buildBooklet } from "./booklet";
import { loadConfig, type AppConfig } from "./config";
import { ScanbookError, errorMessage } from "./errors";
import { createLogger, type Logger, type LoggerOptions } from "./logger";
import { createToolchain, type Toolchain } from "./toolchain";
import type { BookletProgressEvent } from "../types";

export type CliOptions = {
  title: string;
  author: string;
  outputDir: string;
  verbose: boolean;
};

export type CliDeps = {
  env?: Record<string, string | undefined>;
  cwd?: string;
  createToolchain?: (config: AppConfig, logger: Logger) => Toolchain;
  createLogger?: (options: LoggerOptions) => Logger;
};

function describeFailure(error: unknown, verbose: boolean): string {
  if (error instanceof ZodError) {
    const details = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    return `Invalid configuration: ${details}`;
  }
  if (error instanceof ScanbookError) {
    return `[${error.code}] ${verbose && error.stack ? error.stack : error.message}`;
  }
  if (verbose && error instanceof Error && error.stack) return error.stack;
  return errorMessage(error);
}

function progressLogger(logger: Logger): (event: BookletProgressEvent) => void {
  return (event) => {
    switch (event.type) {
      case "stage":
        logger.info(event.message);
        break;
      case "page_done":
        logger.debug(`pass=${event.pass} ${event.index}/${event.total} ${event.page}`);
        break;
      case "pages_discovered":
        logger.debug(`page order: ${event.pages.join(", ")}`);
        break;
      default:
        break;
    }
  };
}

export function createProgram(deps: CliDeps = {}): Command {
  const cwd = deps.cwd ?? process.cwd();

  const program = new Command()
    .name("scanbook")
    .description("Turn a directory of page scans into <title>.cbz and a prepress <title>.pdf")
    .argument("<directory>", "directory containing the page images")
    .requiredOption("-t, --title <title>", "title used to name both outputs and for PDF metadata")
    .option("-a, --author <author>", "author written to the PDF metadata", "")
    .option("-o, --output-dir <dir>", "where to write the outputs", ".")
    .option("-v, --verbose", "log every page and tool invocation", false)
    .action(async (directory: string, options: CliOptions) => {
      const makeLogger = deps.createLogger ?? createLogger;
      let logger = makeLogger({ verbose: options.verbose });
      try {
        const config = loadConfig(deps.env ?? process.env, cwd);
        logger = makeLogger({ verbose: options.verbose, logFilePath: config.logFileAbsolute });
        const toolchain = (deps.createToolchain ?? createToolchain)(config, logger);

        const booklet = await buildBooklet({
          config,
          toolchain,
          logger,
          sourceDir: path.resolve(cwd, directory),
          title: options.title,
          author: options.author,
          outputDir: path.resolve(cwd, options.outputDir),
          onProgress: progressLogger(logger),
        });

        logger.info(`done pages=${booklet.pageCount}`);
        logger.info(`cbz: ${booklet.archivePath}`);
        logger.info(`pdf: ${booklet.pdfPath}`);
      } catch (error) {
        logger.error(describeFailure(error, options.verbose));
        throw error;
      }
    });

  return program;
}
