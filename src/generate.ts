import * as fs from "fs";
import * as path from "path";
import { ICON_SIZES, resolveOutputDir } from "./config";
import { readPngDimensions } from "./png";
import { renderIcon } from "./renderer";

/**
 * Render every entry of the icon size table and write it as PNG.
 * The first failure aborts the run; files already written stay on disk.
 */
export function generateAll(outputDir: string = resolveOutputDir()): string[] {
  const written: string[] = [];

  for (const { size, filename } of ICON_SIZES) {
    console.log(`[icons] Generating ${filename} (${size}x${size})`);
    const icon = renderIcon(size);

    fs.mkdirSync(outputDir, { recursive: true });

    const { width, height } = readPngDimensions(icon.png);
    if (width !== size || height !== size) {
      throw new Error(`Rendered ${filename} is ${width}x${height}, expected ${size}x${size}`);
    }

    const outPath = path.join(outputDir, filename);
    fs.writeFileSync(outPath, icon.png);
    written.push(outPath);
  }

  console.log(`[icons] All icons generated (${written.length} files) in ${outputDir}`);
  return written;
}
