import { readdir, rm } from "node:fs/promises";
import path from "node:path";
import yauzl from "yauzl";
import type { Logger } from "./logger";
import type { Archiver } from "./toolchain";

export function sortEntryNames(names: string[]): string[] {
  return [...names].sort((a, b) => (a === b ? 0 : a < b ? -1 : 1));
}

/**
 * Zips every file of `stagingDir` into a fresh archive at `outputPath`, in
 * lexicographic name order. Returns the entry names in archive order.
 */
export async function packageArchive(params: {
  stagingDir: string;
  outputPath: string;
  archiver: Archiver;
  logger: Logger;
}): Promise<string[]> {
  const entries = await readdir(params.stagingDir, { withFileTypes: true });
  const names = sortEntryNames(entries.filter((entry) => entry.isFile()).map((entry) => entry.name));

  await rm(params.outputPath, { force: true });
  await params.archiver.archive({
    files: names.map((name) => path.join(params.stagingDir, name)),
    outputPath: params.outputPath,
  });

  params.logger.info(`built cbz path=${params.outputPath} pages=${names.length}`);
  return names;
}

/** Lists entry names from the archive's central directory, in stored order. Zip64 archives included. */
export function readArchiveEntryNames(filePath: string): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const fail = (error: Error) => reject(new Error(`${filePath} is not a readable zip archive: ${error.message}`));

    yauzl.open(filePath, { lazyEntries: true, autoClose: true }, (error, opened) => {
      if (error || !opened) {
        fail(error ?? new Error("no archive handle"));
        return;
      }
      const zipfile: yauzl.ZipFile = opened;
      const names: string[] = [];
      zipfile.on("error", fail);
      zipfile.on("entry", (entry: yauzl.Entry) => {
        names.push(entry.fileName);
        zipfile.readEntry();
      });
      zipfile.on("end", () => resolve(names));
      zipfile.readEntry();
    });
  });
}
