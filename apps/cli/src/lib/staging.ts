import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Logger } from "./logger";

export async function withStagingDirectory<T>(
  params: { root: string; prefix: string; logger: Logger },
  fn: (stagingDir: string) => Promise<T>,
): Promise<T> {
  const workspace = existsSync(params.root) ? params.root : tmpdir();
  await mkdir(workspace, { recursive: true });
  const stagingDir = await mkdtemp(path.join(workspace, params.prefix));
  params.logger.debug(`staging created dir=${stagingDir}`);

  try {
    return await fn(stagingDir);
  } finally {
    params.logger.debug(`cleanup dir=${stagingDir}`);
    await rm(stagingDir, { recursive: true, force: true });
  }
}
