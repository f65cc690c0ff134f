import { tmpdir } from "node:os";
import path from "node:path";
import { z } from "zod";

const booleanFlag = (fallback: string) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((v) => !["false", "0", "no", "off", ""].includes(v.trim().toLowerCase()));

const density = (fallback: number) => z.coerce.number().int().min(1).max(4800).default(fallback);

const envSchema = z.object({
  FULL_DENSITY: density(600),
  PRINT_DENSITY: density(300),
  EXPECTED_SOURCE_DPI: density(600),
  SOURCE_DPI_POLICY: z.enum(["exact", "at-least-target"]).default("exact"),
  CROP_MARGIN: z.coerce.number().int().min(0).default(36),
  PAGE_EXTENSION: z
    .string()
    .min(1)
    .default(".png")
    .transform((v) => (v.startsWith(".") ? v : `.${v}`)),
  PAGE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  PARALLEL_PASSES: booleanFlag("false"),
  TOOL_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  TEMP_ROOT: z.string().optional().default(""),
  LOG_FILE: z.string().optional().default(""),
  MAGICK_BIN: z.string().min(1).default("magick"),
  IDENTIFY_BIN: z.string().min(1).default("identify"),
  IMG2PDF_BIN: z.string().min(1).default("img2pdf"),
  GS_BIN: z.string().min(1).default("gs"),
});

export type AppConfig = z.infer<typeof envSchema> & {
  tempRootAbsolute: string;
  logFileAbsolute: string | null;
};

type Env = Record<string, string | undefined>;

function resolveFrom(cwd: string, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(cwd, value);
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  // Empty strings in a .env file mean "use the default".
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const parsed = envSchema.parse(cleaned);
  return {
    ...parsed,
    tempRootAbsolute: parsed.TEMP_ROOT ? resolveFrom(cwd, parsed.TEMP_ROOT) : tmpdir(),
    logFileAbsolute: parsed.LOG_FILE ? resolveFrom(cwd, parsed.LOG_FILE) : null,
  };
}
