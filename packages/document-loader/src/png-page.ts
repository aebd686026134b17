import pngjs from 'pngjs';
import type { PageImage } from '@stmtlens/orientation';

/**
 * Decode a PNG into an RGBA page. Palette, grayscale and 16-bit images are
 * expanded to 8-bit RGBA by the decoder.
 */
export function decodePngPage(buffer: Uint8Array): PageImage {
  const png = pngjs.PNG.sync.read(Buffer.from(buffer));
  return {
    width: png.width,
    height: png.height,
    data: new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.byteLength),
  };
}

export function encodePngPage(image: PageImage): Buffer {
  const png = new pngjs.PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);
  return pngjs.PNG.sync.write(png);
}
