import type { PageImage } from '@stmtlens/orientation';

/**
 * Build an RGBA page where each pixel is a gray level from `values` (row-major).
 */
export function grayImage(width: number, height: number, values: number[], orientation?: number): PageImage {
  const data = new Uint8Array(width * height * 4);
  values.forEach((value, i) => {
    data.set([value, value, value, 255], i * 4);
  });
  return orientation === undefined ? { width, height, data } : { width, height, data, orientation };
}

export function grayValues(image: PageImage): number[] {
  const values: number[] = [];
  for (let i = 0; i < image.data.length; i += 4) {
    values.push(image.data[i] ?? -1);
  }
  return values;
}

export function layoutKey(image: PageImage): string {
  return `${image.width}x${image.height}:${grayValues(image).join(',')}`;
}
