import * as path from "path";
import type { IconSizeEntry, Rgba } from "./types";

// Every drawing constant is expressed against a 512px canvas
export const REFERENCE_SIZE = 512;

export const OUTPUT_DIR = path.join("guitarPlayer", "Assets.xcassets", "AppIcon.appiconset");

// macOS AppIcon set: 1x/2x at 16, 32, 128, 256, 512
export const ICON_SIZES: readonly IconSizeEntry[] = [
  { size: 16, filename: "icon_16x16.png" },
  { size: 32, filename: "icon_16x16@2x.png" },
  { size: 32, filename: "icon_32x32.png" },
  { size: 64, filename: "icon_32x32@2x.png" },
  { size: 128, filename: "icon_128x128.png" },
  { size: 256, filename: "icon_128x128@2x.png" },
  { size: 256, filename: "icon_256x256.png" },
  { size: 512, filename: "icon_256x256@2x.png" },
  { size: 512, filename: "icon_512x512.png" },
  { size: 1024, filename: "icon_512x512@2x.png" },
];

export const PALETTE = {
  background: { r: 102, g: 126, b: 234, a: 255 },
  wood: { r: 255, g: 255, b: 255, a: 240 },
  tuner: { r: 102, g: 126, b: 234, a: 255 },
  string: { r: 102, g: 126, b: 234, a: 200 },
  accent: { r: 255, g: 107, b: 107, a: 255 },
  white: { r: 255, g: 255, b: 255, a: 255 },
} as const satisfies Record<string, Rgba>;

/** Output directory resolved against the working directory */
export function resolveOutputDir(cwd: string = process.cwd()): string {
  return path.resolve(cwd, OUTPUT_DIR);
}
