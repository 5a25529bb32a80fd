import { finiteOrZero, safeDiv, safeSize } from '@/utils/math-guards';
import type { DisplaySize } from '../types';

const FALLBACK_SIZE = { width: 1, height: 1 };

/**
 * Display size of a track: the coded size with the track's rotation applied.
 *
 * Rotation is applied as an affine transform of the size vector, so 90/270
 * swap the sides and arbitrary angles give the rotated extent. Degenerate
 * input never throws; sides below one pixel become 1.
 */
export function computeDisplaySize(codedWidth: number, codedHeight: number, rotation: number): DisplaySize {
  const radians = (finiteOrZero(rotation) * Math.PI) / 180;
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);

  const w = finiteOrZero(codedWidth);
  const h = finiteOrZero(codedHeight);
  const transformedWidth = Math.round(Math.abs(w * cos - h * sin));
  const transformedHeight = Math.round(Math.abs(w * sin + h * cos));

  const size = safeSize(
    Math.max(1, transformedWidth),
    Math.max(1, transformedHeight),
    FALLBACK_SIZE
  );

  return {
    ...size,
    aspectRatio: safeDiv(size.width, size.height, 1),
  };
}
