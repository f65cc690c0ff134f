import path from "node:path";
import pLimit from "p-limit";
import { resolveGeometry } from "./geometry";
import type { Logger } from "./logger";
import type { Toolchain } from "./toolchain";
import type { BookletProgressEvent, Page, SourceDpiPolicy, StagedPage } from "../types";

export type CropScaleParams = {
  pages: Page[];
  stagingDir: string;
  density: number;
  margin: number;
  policy: SourceDpiPolicy;
  expectedResolution: number;
  toolchain: Pick<Toolchain, "probe" | "transform">;
  logger: Logger;
  concurrency?: number;
  passLabel?: string;
  onProgress?: (event: BookletProgressEvent) => void;
};

/**
 * Crops the fixed margin off every page, stamps the target density and resizes,
 * writing `stagingDir/<outputName>` per page. The first failure stops the stage.
 */
export async function cropScalePages(params: CropScaleParams): Promise<StagedPage[]> {
  const limit = pLimit(params.concurrency ?? 1);
  const passLabel = params.passLabel ?? `${params.density}dpi`;
  let completed = 0;

  const stagePage = async (page: Page): Promise<StagedPage> => {
    const geometry = await resolveGeometry({
      probe: params.toolchain.probe,
      filePath: page.sourcePath,
      density: params.density,
      policy: params.policy,
      expected: params.expectedResolution,
    });

    const stagedPath = path.join(params.stagingDir, page.outputName);
    await params.toolchain.transform.transform({
      inputPath: page.sourcePath,
      outputPath: stagedPath,
      margin: params.margin,
      density: params.density,
      resizePercent: geometry.resizePercent,
    });

    completed += 1;
    params.logger.debug(
      `staged pass=${passLabel} page=${page.sourceName} -> ${page.outputName} resolution=${geometry.resolution} resize=${geometry.resizePercent}%`,
    );
    params.onProgress?.({
      type: "page_done",
      pass: passLabel,
      index: completed,
      total: params.pages.length,
      page: page.outputName,
    });
    return { page, stagedPath, geometry };
  };

  let failure: unknown = null;
  const tasks = params.pages.map((page) =>
    limit(async () => {
      if (failure !== null) return null;
      try {
        return await stagePage(page);
      } catch (error) {
        failure ??= error;
        throw error;
      }
    }),
  );

  const settled = await Promise.allSettled(tasks);
  if (failure !== null) throw failure;

  const staged: StagedPage[] = [];
  for (const result of settled) {
    if (result.status === "fulfilled" && result.value) staged.push(result.value);
  }
  return staged;
}
