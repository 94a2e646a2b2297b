import type { PixelBox, Rgba, Shape } from "./types";

function boxSize(box: PixelBox): { width: number; height: number } {
  return { width: box.x1 - box.x0 + 1, height: box.y1 - box.y0 + 1 };
}

function fillAttrs(fill: Rgba): string {
  const color = `fill="rgb(${fill.r},${fill.g},${fill.b})"`;
  return fill.a < 255 ? `${color} fill-opacity="${fill.a / 255}"` : color;
}

export function shapeToSvg(shape: Shape): string {
  const { box } = shape;
  const { width, height } = boxSize(box);
  const fill = fillAttrs(shape.fill);

  switch (shape.kind) {
    case "ellipse":
      return `<ellipse cx="${box.x0 + width / 2}" cy="${box.y0 + height / 2}" rx="${width / 2}" ry="${height / 2}" ${fill}/>`;
    case "rect":
      return `<rect x="${box.x0}" y="${box.y0}" width="${width}" height="${height}" ${fill}/>`;
    case "roundedRect":
      return `<rect x="${box.x0}" y="${box.y0}" width="${width}" height="${height}" rx="${shape.radius}" ry="${shape.radius}" ${fill}/>`;
  }
}

/**
 * Compose shapes into a square SVG document, painted in order.
 * Anti-aliasing is off so each shape covers whole pixels only.
 */
export function composeSvg(size: number, shapes: Shape[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}" shape-rendering="crispEdges">`,
    ...shapes.map((shape) => `  ${shapeToSvg(shape)}`),
    `</svg>`,
  ].join("\n");
}
