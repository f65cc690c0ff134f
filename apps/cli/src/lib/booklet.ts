import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { packageArchive, sortEntryNames } from "./archive";
import type { AppConfig } from "./config";
import { cropScalePages } from "./crop-scale";
import { InputDiscoveryError } from "./errors";
import type { Logger } from "./logger";
import { discoverPages } from "./page-index";
import { withStagingDirectory } from "./staging";
import type { Toolchain } from "./toolchain";
import type { Booklet, BookletProgressEvent, Page } from "../types";

export type BookletParams = {
  config: AppConfig;
  toolchain: Toolchain;
  logger: Logger;
  sourceDir: string;
  title: string;
  author: string;
  outputDir: string;
  onProgress?: (event: BookletProgressEvent) => void;
};

export function validateTitle(raw: string): string {
  const title = raw.trim();
  if (!title) {
    throw new InputDiscoveryError("A non-empty --title is required to name the outputs.");
  }
  if (title.includes("/") || title.includes("\\") || title === "." || title === "..") {
    throw new InputDiscoveryError(`Title "${title}" cannot be used as a file name.`);
  }
  return title;
}

/** Writes through a hidden `.partial` sibling of `finalPath`, renamed into place on success. */
async function publishOutput(finalPath: string, write: (partialPath: string) => Promise<void>): Promise<void> {
  const partialPath = path.join(path.dirname(finalPath), `.${path.basename(finalPath)}.partial`);
  try {
    await write(partialPath);
    await rename(partialPath, finalPath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }
}

export async function buildBooklet(params: BookletParams): Promise<Booklet> {
  const { config, toolchain, logger } = params;
  const title = validateTitle(params.title);
  const outputDir = path.resolve(params.outputDir);
  const archivePath = path.join(outputDir, `${title}.cbz`);
  const pdfPath = path.join(outputDir, `${title}.pdf`);

  params.onProgress?.({ type: "stage", stage: "discover", message: "Discovering source pages" });
  const pages = await discoverPages(params.sourceDir, config.PAGE_EXTENSION);
  logger.info(`discovered pages=${pages.length} dir=${path.resolve(params.sourceDir)}`);
  params.onProgress?.({
    type: "pages_discovered",
    total: pages.length,
    pages: pages.map((page) => page.sourceName),
  });

  await mkdir(outputDir, { recursive: true });

  const stageAt = (pass: string, density: number, stagingDir: string, source: Page[]) =>
    cropScalePages({
      pages: source,
      stagingDir,
      density,
      margin: config.CROP_MARGIN,
      policy: config.SOURCE_DPI_POLICY,
      expectedResolution: config.EXPECTED_SOURCE_DPI,
      toolchain,
      logger,
      concurrency: config.PAGE_CONCURRENCY,
      passLabel: pass,
      onProgress: params.onProgress,
    });

  const archivePass = () =>
    withStagingDirectory({ root: config.tempRootAbsolute, prefix: "scanbook-cbz-", logger }, async (stagingDir) => {
      params.onProgress?.({
        type: "stage",
        stage: "cbz",
        message: `Cropping and scaling ${pages.length} pages at ${config.FULL_DENSITY} dpi`,
      });
      await stageAt("cbz", config.FULL_DENSITY, stagingDir, pages);

      let entries: string[] = [];
      await publishOutput(archivePath, async (partialPath) => {
        entries = await packageArchive({
          stagingDir,
          outputPath: partialPath,
          archiver: toolchain.archiver,
          logger,
        });
      });
      params.onProgress?.({ type: "cbz_ready", path: archivePath, total: entries.length });
      return entries;
    });

  const pdfPass = () =>
    withStagingDirectory({ root: config.tempRootAbsolute, prefix: "scanbook-pdf-", logger }, async (stagingDir) => {
      params.onProgress?.({
        type: "stage",
        stage: "pdf",
        message: `Cropping and scaling ${pages.length} pages at ${config.PRINT_DENSITY} dpi`,
      });
      const staged = await stageAt("pdf", config.PRINT_DENSITY, stagingDir, pages);
      const files = sortEntryNames(staged.map((item) => item.page.outputName)).map((name) =>
        path.join(stagingDir, name),
      );

      const rawPdfPath = path.join(stagingDir, "booklet.raw.pdf");
      await toolchain.pdfConverter.convert({
        files,
        outputPath: rawPdfPath,
        title,
        author: params.author,
      });
      logger.info(`rasterized pdf pages=${files.length} density=${config.PRINT_DENSITY}`);

      await publishOutput(pdfPath, (partialPath) =>
        toolchain.pdfOptimizer.optimize({ inputPath: rawPdfPath, outputPath: partialPath, profile: "prepress" }),
      );
      logger.info(`built pdf path=${pdfPath}`);
      params.onProgress?.({ type: "pdf_ready", path: pdfPath, total: files.length });
    });

  let archiveEntries: string[];
  if (config.PARALLEL_PASSES) {
    const [archiveResult, pdfResult] = await Promise.allSettled([archivePass(), pdfPass()]);
    if (archiveResult.status === "rejected") throw archiveResult.reason;
    if (pdfResult.status === "rejected") throw pdfResult.reason;
    archiveEntries = archiveResult.value;
  } else {
    archiveEntries = await archivePass();
    await pdfPass();
  }

  return { archivePath, pdfPath, pageCount: pages.length, archiveEntries };
}
