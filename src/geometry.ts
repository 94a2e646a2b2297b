/**
 * Guitar icon layout.
 *
 * Produces the ordered list of shapes for a square canvas of the given size.
 * Base constants are designed on a 512px canvas and scaled with truncation,
 * so every box lands on whole pixels.
 */

import { PALETTE, REFERENCE_SIZE } from "./config";
import type { PixelBox, Rgba, Shape } from "./types";

const TUNER_OFFSETS_X = [-100, -50, 50, 100];
const TUNER_OFFSET_Y = -170;
const STRING_OFFSETS_X = [-100, -50, 50, 100];
const NOTE_OFFSETS: Array<[number, number]> = [[-60, -80], [60, -80]];

export function scaleFactor(size: number): number {
  return size / REFERENCE_SIZE;
}

/** Scaled base constant, truncated toward zero */
export function scaled(value: number, scale: number): number {
  return Math.trunc(value * scale);
}

function half(value: number): number {
  return Math.floor(value / 2);
}

function centeredBox(cx: number, cy: number, diameter: number): PixelBox {
  const r = half(diameter);
  return { x0: cx - r, y0: cy - r, x1: cx + r, y1: cy + r };
}

export function layoutGuitarIcon(size: number): Shape[] {
  const scale = scaleFactor(size);
  const px = (value: number) => scaled(value, scale);
  const center = half(size);
  const shapes: Shape[] = [];

  const ellipse = (part: Shape["part"], box: PixelBox, fill: Rgba) =>
    shapes.push({ kind: "ellipse", part, box, fill: { ...fill } });
  const rect = (part: Shape["part"], box: PixelBox, fill: Rgba) =>
    shapes.push({ kind: "rect", part, box, fill: { ...fill } });

  // Background disc
  const margin = px(20);
  const discSize = size - 2 * margin;
  ellipse("background", { x0: margin, y0: margin, x1: margin + discSize, y1: margin + discSize }, PALETTE.background);

  // Body
  const bodyWidth = px(200);
  const bodyHeight = px(120);
  const bodyOffset = px(40);
  ellipse("body", {
    x0: center - half(bodyWidth),
    y0: center - half(bodyHeight) + bodyOffset,
    x1: center + half(bodyWidth),
    y1: center + half(bodyHeight) + bodyOffset,
  }, PALETTE.wood);

  // Neck
  const neckWidth = px(200);
  const neckTop = center - px(160);
  shapes.push({
    kind: "roundedRect",
    part: "neck",
    box: { x0: center - half(neckWidth), y0: neckTop, x1: center + half(neckWidth), y1: neckTop + px(30) },
    radius: px(14),
    fill: { ...PALETTE.wood },
  });

  // Headstock
  const headWidth = px(280);
  const headTop = center - px(200);
  shapes.push({
    kind: "roundedRect",
    part: "headstock",
    box: { x0: center - half(headWidth), y0: headTop, x1: center + half(headWidth), y1: headTop + px(60) },
    radius: px(30),
    fill: { ...PALETTE.wood },
  });

  const tunerSize = px(12);
  for (const x of TUNER_OFFSETS_X) {
    ellipse("tuner", centeredBox(center + px(x), center + px(TUNER_OFFSET_Y), tunerSize), PALETTE.tuner);
  }

  const stringWidth = px(4);
  const stringTop = center - px(140);
  const stringBottom = center + px(40);
  for (const x of STRING_OFFSETS_X) {
    const sx = center + px(x);
    rect("string", { x0: sx - half(stringWidth), y0: stringTop, x1: sx + half(stringWidth), y1: stringBottom }, PALETTE.string);
  }

  // Sound hole: red disc with a white disc on top, reads as a ring
  const holeCenterY = center + px(40);
  ellipse("soundHole", centeredBox(center, holeCenterY, 2 * px(40)), PALETTE.accent);
  ellipse("soundHoleInner", centeredBox(center, holeCenterY, 2 * px(30)), PALETTE.white);

  const noteSize = px(16);
  const stemWidth = px(4);
  for (const [x, y] of NOTE_OFFSETS) {
    const nx = center + px(x);
    const ny = center + px(y);
    ellipse("noteHead", centeredBox(nx, ny, noteSize), PALETTE.accent);

    const edge = nx + half(noteSize);
    rect("noteStem", {
      x0: edge - half(stemWidth),
      y0: ny - noteSize,
      x1: edge + half(stemWidth),
      y1: ny + half(noteSize),
    }, PALETTE.accent);
  }

  return shapes;
}
