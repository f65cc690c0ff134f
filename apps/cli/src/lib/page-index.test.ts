import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InputDiscoveryError } from "./errors";
import { canonicalPageName, discoverPages, extractPageIndex, orderPages, pageNameWidth } from "./page-index";

describe("extractPageIndex", () => {
  it("parses the first run of digits", () => {
    expect(extractPageIndex("scan10.png")).toBe(10);
    expect(extractPageIndex("vol2_page007.png")).toBe(2);
    expect(extractPageIndex("007.png")).toBe(7);
  });

  it("falls back to 0 when the name has no digits", () => {
    expect(extractPageIndex("cover.png")).toBe(0);
  });

  it("rejects page numbers beyond the safe integer range", () => {
    expect(extractPageIndex("scan9007199254740991.png")).toBe(9007199254740991);
    expect(() => extractPageIndex("scan9007199254740993.png")).toThrow(
      'Page number 9007199254740993 in "scan9007199254740993.png" is too large to order pages by.',
    );
    expect(() => extractPageIndex("scan9007199254740993.png")).toThrow(InputDiscoveryError);
  });
});

describe("canonicalPageName", () => {
  it("pads to three digits and keeps the extension", () => {
    expect(canonicalPageName(7, ".png")).toBe("page-007.png");
    expect(canonicalPageName(999, ".png")).toBe("page-999.png");
  });

  it("honours a wider padding", () => {
    expect(canonicalPageName(12, ".png", 4)).toBe("page-0012.png");
    expect(canonicalPageName(1000, ".png", 4)).toBe("page-1000.png");
  });
});

describe("pageNameWidth", () => {
  it("never goes below three digits", () => {
    expect(pageNameWidth([])).toBe(3);
    expect(pageNameWidth([1, 2, 999])).toBe(3);
  });

  it("widens for indices of 1000 and above", () => {
    expect(pageNameWidth([5, 1000])).toBe(4);
    expect(pageNameWidth([12345])).toBe(5);
  });
});

describe("orderPages", () => {
  it("orders by numeric index rather than by name", () => {
    const pages = orderPages(["/in/scan2.png", "/in/scan10.png", "/in/scan1.png"]);

    expect(pages.map((page) => [page.sourceName, page.outputName])).toEqual([
      ["scan1.png", "page-001.png"],
      ["scan2.png", "page-002.png"],
      ["scan10.png", "page-010.png"],
    ]);
    expect(pages[0]).toEqual({
      sourcePath: "/in/scan1.png",
      sourceName: "scan1.png",
      index: 1,
      outputName: "page-001.png",
    });
  });

  it("breaks index ties by file name", () => {
    const forward = orderPages(["/in/b5.png", "/in/a5.jpg"]);
    const backward = orderPages(["/in/a5.jpg", "/in/b5.png"]);

    expect(forward.map((page) => page.outputName)).toEqual(["page-005.jpg", "page-005.png"]);
    expect(backward).toEqual(forward);
  });

  it("widens every name once an index reaches 1000", () => {
    const pages = orderPages(["/in/p1000.png", "/in/p2.png"]);
    expect(pages.map((page) => page.outputName)).toEqual(["page-0002.png", "page-1000.png"]);
  });

  it("rejects two pages that map to the same output name", () => {
    expect(() => orderPages(["/in/b01.png", "/in/a1.png"])).toThrow(
      'Pages "a1.png" and "b01.png" both map to page-001.png; rename one of them.',
    );
  });
});

describe("discoverPages", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "scanbook-pages-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists matching files only and orders them", async () => {
    for (const name of ["scan2.png", "scan10.png", "scan1.png", "notes.txt", "SCAN3.PNG"]) {
      await writeFile(path.join(dir, name), "x");
    }
    await mkdir(path.join(dir, "folder4.png"));

    const pages = await discoverPages(dir, ".png");

    expect(pages.map((page) => page.sourcePath)).toEqual([
      path.join(dir, "scan1.png"),
      path.join(dir, "scan2.png"),
      path.join(dir, "scan10.png"),
    ]);
  });

  it("fails when nothing matches", async () => {
    await writeFile(path.join(dir, "readme.md"), "x");

    await expect(discoverPages(dir, ".png")).rejects.toThrow(`No *.png pages found in ${dir}.`);
  });

  it("fails on a missing directory", async () => {
    await expect(discoverPages(path.join(dir, "missing"), ".png")).rejects.toBeInstanceOf(InputDiscoveryError);
  });
});
