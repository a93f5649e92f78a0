import type { ImageBlock } from '../types.js';

const DEFAULT_IMAGE_ROWS = 6;
const MIN_IMAGE_ROWS = 3;

/**
 * Rows an image occupies at `columns` cells wide, from its pixel aspect ratio.
 * Clamped to [3, max(3, viewportHeight - 2)]; 6 rows when the ratio is unknown.
 */
export function imageRows(
  width: number | undefined,
  height: number | undefined,
  columns: number,
  viewportHeight: number,
): number {
  const cols = Math.max(1, columns);
  let rows = DEFAULT_IMAGE_ROWS;
  if (width !== undefined && height !== undefined) {
    rows = Math.ceil((height / Math.max(1, width)) * cols);
  }
  const maxRows = Math.max(MIN_IMAGE_ROWS, viewportHeight - 2);
  return Math.min(maxRows, Math.max(MIN_IMAGE_ROWS, rows));
}

export function imageFallbackText(image: Pick<ImageBlock, 'alt' | 'width' | 'height'>): string {
  const alt = image.alt?.trim();
  if (alt) {
    return `Image: ${alt}`;
  }
  if (image.width !== undefined && image.height !== undefined) {
    return `Image (${image.width}x${image.height})`;
  }
  return 'Image';
}

export function hasImageData(image: ImageBlock): boolean {
  return image.data !== undefined && image.data.length > 0;
}
