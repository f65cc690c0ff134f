import { copyFile, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ExternalToolError } from "../lib/errors";
import type { Toolchain } from "../lib/toolchain";
import type { PdfProfile, TransformJob } from "../types";

export type FakeToolchainOptions = {
  /** Resolution reported per source basename; `defaultResolution` otherwise. */
  resolutions?: Record<string, number>;
  defaultResolution?: number;
  /** Source basenames whose transform exits non-zero. */
  failTransformFor?: string[];
  failPdfConverter?: boolean;
  failPdfOptimizer?: boolean;
};

export type FakeToolchain = Toolchain & {
  probed: string[];
  transforms: TransformJob[];
  archives: { files: string[]; outputPath: string }[];
  pdfConversions: { files: string[]; outputPath: string; title: string; author: string }[];
  optimizations: { inputPath: string; outputPath: string; profile: PdfProfile }[];
};

function toolFailure(command: string, args: string[]): ExternalToolError {
  return new ExternalToolError({ command, args, exitCode: 1, stdout: "", stderr: `${command}: simulated failure` });
}

export function createFakeToolchain(options: FakeToolchainOptions = {}): FakeToolchain {
  const probed: string[] = [];
  const transforms: TransformJob[] = [];
  const archives: FakeToolchain["archives"] = [];
  const pdfConversions: FakeToolchain["pdfConversions"] = [];
  const optimizations: FakeToolchain["optimizations"] = [];
  const failing = new Set(options.failTransformFor ?? []);

  return {
    probed,
    transforms,
    archives,
    pdfConversions,
    optimizations,
    probe: {
      readResolution: async (filePath) => {
        const name = path.basename(filePath);
        probed.push(name);
        return options.resolutions?.[name] ?? options.defaultResolution ?? 600;
      },
    },
    transform: {
      transform: async (job) => {
        transforms.push(job);
        const name = path.basename(job.inputPath);
        if (failing.has(name)) throw toolFailure("magick", [job.inputPath, job.outputPath]);
        await writeFile(job.outputPath, `${name}@${job.density}:${job.resizePercent}`);
      },
    },
    archiver: {
      archive: async ({ files, outputPath }) => {
        archives.push({ files: [...files], outputPath });
        const contents = await Promise.all(files.map((file) => readFile(file, "utf8")));
        await writeFile(
          outputPath,
          files.map((file, i) => `${path.basename(file)}=${contents[i]}`).join("\n"),
        );
      },
    },
    pdfConverter: {
      convert: async (params) => {
        pdfConversions.push({ ...params, files: [...params.files] });
        if (options.failPdfConverter) throw toolFailure("img2pdf", params.files);
        await writeFile(params.outputPath, `%PDF ${params.title} ${params.files.map((f) => path.basename(f)).join(",")}`);
      },
    },
    pdfOptimizer: {
      optimize: async (params) => {
        optimizations.push(params);
        if (options.failPdfOptimizer) throw toolFailure("gs", [params.inputPath]);
        await copyFile(params.inputPath, params.outputPath);
      },
    },
  };
}
