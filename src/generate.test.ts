import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { generateAll } from "./generate";
import { ICON_SIZES, OUTPUT_DIR, resolveOutputDir } from "./config";
import { readPngDimensions } from "./png";

describe("generateAll", () => {
  let tmpRoot: string;
  let outputDir: string;

  beforeEach(() => {
    tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), "guitar-icons-"));
    outputDir = path.join(tmpRoot, "nested", "AppIcon.appiconset");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it("writes every icon of the table into a fresh directory", () => {
    const written = generateAll(outputDir);

    expect(written).toEqual(ICON_SIZES.map((e) => path.join(outputDir, e.filename)));
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      "icon_128x128.png",
      "icon_128x128@2x.png",
      "icon_16x16.png",
      "icon_16x16@2x.png",
      "icon_256x256.png",
      "icon_256x256@2x.png",
      "icon_32x32.png",
      "icon_32x32@2x.png",
      "icon_512x512.png",
      "icon_512x512@2x.png",
    ]);

    for (const { size, filename } of ICON_SIZES) {
      const png = fs.readFileSync(path.join(outputDir, filename));
      expect(readPngDimensions(png)).toEqual({ width: size, height: size });
    }
  });

  it("logs one line per file and a completion line", () => {
    generateAll(outputDir);

    const lines = vi.mocked(console.log).mock.calls.map((call) => call[0]);
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe("[icons] Generating icon_16x16.png (16x16)");
    expect(lines[9]).toBe("[icons] Generating icon_512x512@2x.png (1024x1024)");
    expect(lines[10]).toBe(`[icons] All icons generated (10 files) in ${outputDir}`);
  });

  it("re-runs over an existing directory", () => {
    generateAll(outputDir);
    const first = fs.readFileSync(path.join(outputDir, "icon_32x32.png"));

    expect(() => generateAll(outputDir)).not.toThrow();
    expect(fs.readdirSync(outputDir)).toHaveLength(10);
    expect(fs.readFileSync(path.join(outputDir, "icon_32x32.png")).equals(first)).toBe(true);
  });
});

describe("resolveOutputDir", () => {
  it("resolves the asset catalog path against the working directory", () => {
    expect(resolveOutputDir("/work")).toBe(path.resolve("/work", OUTPUT_DIR));
    expect(OUTPUT_DIR).toBe(path.join("guitarPlayer", "Assets.xcassets", "AppIcon.appiconset"));
  });
});
