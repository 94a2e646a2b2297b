export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** Inclusive pixel bounds: covers x0..x1 and y0..y1 */
export interface PixelBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type ShapePart =
  | "background"
  | "body"
  | "neck"
  | "headstock"
  | "tuner"
  | "string"
  | "soundHole"
  | "soundHoleInner"
  | "noteHead"
  | "noteStem";

interface ShapeBase {
  part: ShapePart;
  box: PixelBox;
  fill: Rgba;
}

export interface EllipseShape extends ShapeBase {
  kind: "ellipse";
}

export interface RectShape extends ShapeBase {
  kind: "rect";
}

export interface RoundedRectShape extends ShapeBase {
  kind: "roundedRect";
  radius: number;
}

export type Shape = EllipseShape | RectShape | RoundedRectShape;

export interface IconSizeEntry {
  readonly size: number;
  readonly filename: string;
}

export interface RenderedIcon {
  size: number;
  png: Buffer;
  /** RGBA, row-major, size * size * 4 bytes */
  pixels: Buffer;
}
