export type Page = {
  sourcePath: string;
  sourceName: string;
  index: number;
  outputName: string;
};

export type GeometryDetails = {
  resolution: number;
  density: number;
  resizePercent: number;
};

export type SourceDpiPolicy = "exact" | "at-least-target";

export type TransformJob = {
  inputPath: string;
  outputPath: string;
  margin: number;
  density: number;
  resizePercent: number;
};

export type StagedPage = {
  page: Page;
  stagedPath: string;
  geometry: GeometryDetails;
};

export type PdfProfile = "screen" | "ebook" | "printer" | "prepress" | "default";

export type Booklet = {
  archivePath: string;
  pdfPath: string;
  pageCount: number;
  archiveEntries: string[];
};

export type BookletProgressEvent =
  | { type: "stage"; stage: string; message: string }
  | { type: "pages_discovered"; total: number; pages: string[] }
  | { type: "page_done"; pass: string; index: number; total: number; page: string }
  | { type: "cbz_ready"; path: string; total: number }
  | { type: "pdf_ready"; path: string; total: number };
