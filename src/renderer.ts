/**
 * Rasterizes the guitar icon at a given pixel size.
 */
import { Resvg } from "@resvg/resvg-js";
import { layoutGuitarIcon } from "./geometry";
import { composeSvg } from "./svg";
import type { Rgba, RenderedIcon } from "./types";

export function renderIcon(size: number): RenderedIcon {
  const svg = composeSvg(size, layoutGuitarIcon(size));

  const resvg = new Resvg(svg, {
    fitTo: { mode: "width", value: size },
    background: "rgba(0,0,0,0)",
  });
  const rendered = resvg.render();

  return {
    size,
    png: Buffer.from(rendered.asPng()),
    pixels: Buffer.from(rendered.pixels),
  };
}

export function pixelAt(icon: RenderedIcon, x: number, y: number): Rgba {
  if (x < 0 || y < 0 || x >= icon.size || y >= icon.size) {
    throw new Error(`Pixel (${x}, ${y}) outside ${icon.size}x${icon.size} canvas`);
  }
  const i = (y * icon.size + x) * 4;
  return {
    r: icon.pixels[i],
    g: icon.pixels[i + 1],
    b: icon.pixels[i + 2],
    a: icon.pixels[i + 3],
  };
}
