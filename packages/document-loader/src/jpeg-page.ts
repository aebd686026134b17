import jpeg from 'jpeg-js';
import type { PageImage } from '@stmtlens/orientation';
import { readJpegOrientation } from './exif-orientation.js';

/**
 * Decode a JPEG into an RGBA page, keeping its EXIF orientation tag so the
 * resolver can apply it.
 */
export function decodeJpegPage(buffer: Uint8Array): PageImage {
  const decoded = jpeg.decode(buffer, { useTArray: true, formatAsRGBA: true });

  return {
    width: decoded.width,
    height: decoded.height,
    data: decoded.data,
    orientation: readJpegOrientation(buffer),
  };
}

export function encodeJpegPage(image: PageImage, quality = 90): Uint8Array {
  const encoded = jpeg.encode({ width: image.width, height: image.height, data: image.data }, quality);
  return new Uint8Array(encoded.data);
}
