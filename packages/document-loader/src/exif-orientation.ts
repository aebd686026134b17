/**
 * Read the EXIF orientation tag (0x0112) from a JPEG's APP1 segment.
 * Returns undefined when the file carries no usable tag.
 */

const ORIENTATION_TAG = 0x0112;

export function readJpegOrientation(bytes: Uint8Array): number | undefined {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (view.byteLength < 4 || view.getUint16(0) !== 0xffd8) {
    return undefined;
  }

  let offset = 2;
  while (offset + 4 <= view.byteLength) {
    const marker = view.getUint16(offset);
    const length = view.getUint16(offset + 2);
    // start of scan: no metadata segments follow
    if (marker === 0xffda || (marker & 0xff00) !== 0xff00) {
      return undefined;
    }
    if (marker === 0xffe1 && offset + 10 <= view.byteLength && view.getUint32(offset + 4) === 0x45786966) {
      return readTiffOrientation(view, offset + 10, Math.min(offset + 2 + length, view.byteLength));
    }
    offset += 2 + length;
  }
  return undefined;
}

function readTiffOrientation(view: DataView, tiffStart: number, end: number): number | undefined {
  if (tiffStart + 8 > end) return undefined;

  const byteOrder = view.getUint16(tiffStart);
  if (byteOrder !== 0x4949 && byteOrder !== 0x4d4d) return undefined;
  const little = byteOrder === 0x4949;

  const ifdStart = tiffStart + view.getUint32(tiffStart + 4, little);
  if (ifdStart + 2 > end) return undefined;

  const entries = view.getUint16(ifdStart, little);
  for (let i = 0; i < entries; i++) {
    const entry = ifdStart + 2 + i * 12;
    if (entry + 12 > end) return undefined;
    if (view.getUint16(entry, little) === ORIENTATION_TAG) {
      const value = view.getUint16(entry + 8, little);
      return value >= 1 && value <= 8 ? value : undefined;
    }
  }
  return undefined;
}
