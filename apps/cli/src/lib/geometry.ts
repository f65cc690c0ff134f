import { PreconditionError } from "./errors";
import type { GeometryDetails, SourceDpiPolicy } from "../types";
import type { MetadataProbe } from "./toolchain";

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new PreconditionError(`${name} must be a positive integer, got ${value}.`);
  }
}

/**
 * Percentage that brings a `resolution` dpi image to `density` dpi.
 * Truncates toward zero, never rounds.
 */
export function computeResizePercent(resolution: number, density: number): number {
  assertPositiveInteger("resolution", resolution);
  assertPositiveInteger("density", density);
  return Math.floor((100 * density) / resolution);
}

export function assertSourceResolution(params: {
  resolution: number;
  density: number;
  policy: SourceDpiPolicy;
  expected: number;
  filePath?: string;
}): void {
  const where = params.filePath ? ` (${params.filePath})` : "";
  if (params.policy === "exact") {
    if (params.resolution !== params.expected) {
      throw new PreconditionError(
        `Source resolution ${params.resolution} dpi does not match the expected ${params.expected} dpi${where}.`,
      );
    }
    return;
  }
  if (params.resolution < params.density) {
    throw new PreconditionError(
      `Source resolution ${params.resolution} dpi is below the target density ${params.density} dpi${where}.`,
    );
  }
}

export async function resolveGeometry(params: {
  probe: MetadataProbe;
  filePath: string;
  density: number;
  policy: SourceDpiPolicy;
  expected: number;
}): Promise<GeometryDetails> {
  const resolution = await params.probe.readResolution(params.filePath);
  assertSourceResolution({
    resolution,
    density: params.density,
    policy: params.policy,
    expected: params.expected,
    filePath: params.filePath,
  });
  return {
    resolution,
    density: params.density,
    resizePercent: computeResizePercent(resolution, params.density),
  };
}
