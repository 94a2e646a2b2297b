const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

// Signature (8) + IHDR length (4) + type (4) + width (4) + height (4)
const IHDR_END = 24;

/** Read width/height from the IHDR chunk of a PNG buffer */
export function readPngDimensions(png: Buffer): { width: number; height: number } {
  if (png.length < IHDR_END || !png.subarray(0, 8).equals(PNG_SIGNATURE)) {
    throw new Error("Not a PNG: missing signature");
  }
  if (png.toString("ascii", 12, 16) !== "IHDR") {
    throw new Error("Not a PNG: first chunk is not IHDR");
  }

  return {
    width: png.readUInt32BE(16),
    height: png.readUInt32BE(20),
  };
}
