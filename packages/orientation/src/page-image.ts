/**
 * Decoded page image and the exact right-angle transforms applied to it.
 * Pixels are RGBA, row-major, four bytes per pixel.
 */

export const CHANNELS = 4;

export interface PageImage {
  width: number;
  height: number;
  data: Uint8Array;
  /** EXIF orientation tag (1-8) carried over from the source file */
  orientation?: number | undefined;
}

export type PixelTransform =
  | 'rotate90'
  | 'rotate180'
  | 'rotate270'
  | 'flipHorizontal'
  | 'flipVertical'
  | 'transpose'
  | 'transverse';

type PixelMapper = (x: number, y: number, width: number, height: number) => readonly [number, number];

/**
 * rotate90 turns the page counter-clockwise, rotate270 clockwise.
 */
const TRANSFORMS: Record<PixelTransform, { swapsAxes: boolean; map: PixelMapper }> = {
  rotate90: { swapsAxes: true, map: (x, y, w) => [y, w - 1 - x] },
  rotate180: { swapsAxes: false, map: (x, y, w, h) => [w - 1 - x, h - 1 - y] },
  rotate270: { swapsAxes: true, map: (x, y, _w, h) => [h - 1 - y, x] },
  flipHorizontal: { swapsAxes: false, map: (x, y, w) => [w - 1 - x, y] },
  flipVertical: { swapsAxes: false, map: (x, y, _w, h) => [x, h - 1 - y] },
  transpose: { swapsAxes: true, map: (x, y) => [y, x] },
  transverse: { swapsAxes: true, map: (x, y, w, h) => [h - 1 - y, w - 1 - x] },
};

/**
 * Transforms that undo each EXIF orientation tag.
 */
const EXIF_TRANSFORMS: Record<number, PixelTransform | undefined> = {
  2: 'flipHorizontal',
  3: 'rotate180',
  4: 'flipVertical',
  5: 'transpose',
  6: 'rotate270',
  7: 'transverse',
  8: 'rotate90',
};

export function assertPageImage(image: PageImage): void {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid page dimensions: ${width}x${height}`);
  }
  if (data.length !== width * height * CHANNELS) {
    throw new Error(`Pixel buffer holds ${data.length} bytes, expected ${width * height * CHANNELS}`);
  }
}

export function transformImage(image: PageImage, transform: PixelTransform): PageImage {
  assertPageImage(image);

  const { swapsAxes, map } = TRANSFORMS[transform];
  const { width, height, data } = image;
  const outWidth = swapsAxes ? height : width;
  const outHeight = swapsAxes ? width : height;
  const out = new Uint8Array(data.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [dx, dy] = map(x, y, width, height);
      const src = (y * width + x) * CHANNELS;
      out.set(data.subarray(src, src + CHANNELS), (dy * outWidth + dx) * CHANNELS);
    }
  }

  return { width: outWidth, height: outHeight, data: out };
}

/**
 * Rotate by a right angle. Positive angles turn counter-clockwise.
 */
export function rotateImage(image: PageImage, angle: 0 | 90 | 180 | 270): PageImage {
  switch (angle) {
    case 0:
      return image;
    case 90:
      return transformImage(image, 'rotate90');
    case 180:
      return transformImage(image, 'rotate180');
    case 270:
      return transformImage(image, 'rotate270');
  }
}

/**
 * Apply the EXIF orientation tag so pixels are stored upright, and drop the tag.
 * Images without a tag are returned as is.
 */
export function normalizeExifOrientation(image: PageImage): PageImage {
  if (image.orientation === undefined) {
    return image;
  }

  const transform = EXIF_TRANSFORMS[image.orientation];
  if (transform === undefined) {
    return { width: image.width, height: image.height, data: image.data };
  }

  return transformImage(image, transform);
}
