import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { InputDiscoveryError } from "./errors";
import type { Page } from "../types";

const MIN_PAGE_NAME_WIDTH = 3;

export function extractPageIndex(fileName: string): number {
  const match = fileName.match(/\d+/);
  if (!match) return 0;
  const index = Number.parseInt(match[0], 10);
  if (!Number.isSafeInteger(index)) {
    throw new InputDiscoveryError(`Page number ${match[0]} in "${fileName}" is too large to order pages by.`);
  }
  return index;
}

export function canonicalPageName(index: number, extension: string, width = MIN_PAGE_NAME_WIDTH): string {
  return `page-${String(index).padStart(width, "0")}${extension}`;
}

/** Padding grows with the largest index so names stay unique and sort in page order. */
export function pageNameWidth(indices: number[]): number {
  const largest = indices.reduce((max, value) => Math.max(max, value), 0);
  return Math.max(MIN_PAGE_NAME_WIDTH, String(largest).length);
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function orderPages(sourcePaths: string[]): Page[] {
  const entries = sourcePaths.map((sourcePath) => {
    const sourceName = path.basename(sourcePath);
    return { sourcePath, sourceName, index: extractPageIndex(sourceName) };
  });

  entries.sort((a, b) => a.index - b.index || compareNames(a.sourceName, b.sourceName));

  const width = pageNameWidth(entries.map((entry) => entry.index));
  const claimed = new Map<string, string>();

  return entries.map((entry) => {
    const outputName = canonicalPageName(entry.index, path.extname(entry.sourceName), width);
    const previous = claimed.get(outputName);
    if (previous) {
      throw new InputDiscoveryError(
        `Pages "${previous}" and "${entry.sourceName}" both map to ${outputName}; rename one of them.`,
      );
    }
    claimed.set(outputName, entry.sourceName);
    return { ...entry, outputName };
  });
}

export async function discoverPages(directory: string, extension: string): Promise<Page[]> {
  const root = path.resolve(directory);

  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new InputDiscoveryError(
      `Cannot read source directory ${root}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
    .map((entry) => path.join(root, entry.name));

  if (!files.length) {
    throw new InputDiscoveryError(`No *${extension} pages found in ${root}.`);
  }

  return orderPages(files);
}
