import { createWriteStream } from "node:fs";
import path from "node:path";
import yazl from "yazl";
import { readArchiveEntryNames } from "./archive";
import type { AppConfig } from "./config";
import { ExternalToolError } from "./errors";
import { runTool } from "./exec";
import type { Logger } from "./logger";
import type { PdfProfile, TransformJob } from "../types";

export type MetadataProbe = {
  readResolution: (filePath: string) => Promise<number>;
};

export type RasterTransform = {
  transform: (job: TransformJob) => Promise<void>;
};

export type Archiver = {
  archive: (params: { files: string[]; outputPath: string }) => Promise<void>;
};

export type PdfConverter = {
  convert: (params: { files: string[]; outputPath: string; title: string; author: string }) => Promise<void>;
};

export type PdfOptimizer = {
  optimize: (params: { inputPath: string; outputPath: string; profile: PdfProfile }) => Promise<void>;
};

export type Toolchain = {
  probe: MetadataProbe;
  transform: RasterTransform;
  archiver: Archiver;
  pdfConverter: PdfConverter;
  pdfOptimizer: PdfOptimizer;
};

type ToolContext = {
  timeoutMs: number;
  logger?: Logger;
};

/** Parses `identify -format %x` output such as `600`, `600 PixelsPerInch` or `299.999`. */
export function parseResolution(output: string): number | null {
  const match = output.trim().match(/^(\d+(?:\.\d+)?)/);
  if (!match) return null;
  const value = Math.round(Number.parseFloat(match[1]));
  return value > 0 ? value : null;
}

export function buildTransformArgs(job: TransformJob): string[] {
  const m = job.margin;
  return [
    job.inputPath,
    "-crop",
    `+${m}+${m}`,
    "+repage",
    "-crop",
    `-${m}-${m}`,
    "+repage",
    "-units",
    "PixelsPerInch",
    "-density",
    String(job.density),
    "-resize",
    `${job.resizePercent}%`,
    "-background",
    "white",
    "-alpha",
    "remove",
    "-alpha",
    "off",
    job.outputPath,
  ];
}

export function buildImg2pdfArgs(params: { files: string[]; outputPath: string; title: string; author: string }): string[] {
  // Joined with `=` so a value starting with "-" is not read as an option.
  const args = [`--title=${params.title}`];
  if (params.author.trim()) args.push(`--author=${params.author}`);
  args.push("-o", params.outputPath, ...params.files);
  return args;
}

export function buildGhostscriptArgs(params: { inputPath: string; outputPath: string; profile: PdfProfile }): string[] {
  return [
    "-sDEVICE=pdfwrite",
    "-dCompatibilityLevel=1.7",
    `-dPDFSETTINGS=/${params.profile}`,
    "-dNOPAUSE",
    "-dQUIET",
    "-dBATCH",
    "-o",
    params.outputPath,
    params.inputPath,
  ];
}

export function createImageMagickProbe(bin: string, context: ToolContext): MetadataProbe {
  return {
    readResolution: async (filePath) => {
      const args = ["-units", "PixelsPerInch", "-format", "%x", filePath];
      const { stdout, stderr } = await runTool({ command: bin, args, ...context });
      const resolution = parseResolution(stdout);
      if (resolution === null) {
        throw new ExternalToolError({
          command: bin,
          args,
          exitCode: 0,
          stdout,
          stderr,
          reason: "reported no usable horizontal resolution",
        });
      }
      return resolution;
    },
  };
}

export function createImageMagickTransform(bin: string, context: ToolContext): RasterTransform {
  return {
    transform: async (job) => {
      await runTool({ command: bin, args: buildTransformArgs(job), ...context });
    },
  };
}

export function createYazlArchiver(logger?: Logger): Archiver {
  return {
    archive: async ({ files, outputPath }) => {
      await new Promise<void>((resolve, reject) => {
        const zip = new yazl.ZipFile();
        const out = createWriteStream(outputPath);

        out.on("error", reject);
        zip.outputStream.on("error", reject);
        zip.outputStream.pipe(out).on("close", resolve);

        for (const filePath of files) {
          zip.addFile(filePath, path.basename(filePath));
        }
        zip.end();
      });

      const entries = await readArchiveEntryNames(outputPath);
      if (entries.length !== files.length) {
        throw new ExternalToolError({
          command: "yazl",
          args: [outputPath],
          exitCode: null,
          stdout: "",
          stderr: "",
          reason: `archived ${entries.length} of ${files.length} pages`,
        });
      }
      logger?.debug(`zip written path=${outputPath} entries=${entries.length}`);
    },
  };
}

export function createImg2pdfConverter(bin: string, context: ToolContext): PdfConverter {
  return {
    convert: async (params) => {
      await runTool({ command: bin, args: buildImg2pdfArgs(params), ...context });
    },
  };
}

export function createGhostscriptOptimizer(bin: string, context: ToolContext): PdfOptimizer {
  return {
    optimize: async (params) => {
      await runTool({ command: bin, args: buildGhostscriptArgs(params), ...context });
    },
  };
}

export function createToolchain(config: AppConfig, logger: Logger): Toolchain {
  const context: ToolContext = { timeoutMs: config.TOOL_TIMEOUT_MS, logger };
  return {
    probe: createImageMagickProbe(config.IDENTIFY_BIN, context),
    transform: createImageMagickTransform(config.MAGICK_BIN, context),
    archiver: createYazlArchiver(logger),
    pdfConverter: createImg2pdfConverter(config.IMG2PDF_BIN, context),
    pdfOptimizer: createGhostscriptOptimizer(config.GS_BIN, context),
  };
}
