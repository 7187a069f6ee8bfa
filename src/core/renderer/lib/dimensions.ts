// src/core/renderer/lib/dimensions.ts

import type { ImageDimensions } from '../../../@types/index.js';
import { config } from '../../../config/index.js';

/**
 * Number of text rows for a given row length. The source aspect ratio is scaled by
 * `characterAspect` because character cells are taller than they are wide. Very wide,
 * very short sources would floor to zero rows; those are clamped to one.
 *
 * @param {number} outputWidth - Characters per row.
 * @param {ImageDimensions} source - Source image size in pixels.
 * @param {number} characterAspect - Correction for the width/height ratio of a character cell.
 * @return {number} Row count, at least 1.
 */
export function computeOutputHeight(
    outputWidth: number,
    source: ImageDimensions,
    characterAspect: number = config.rendering.characterAspect,
): number {
    const aspectRatio = source.height / source.width;
    return Math.max(1, Math.floor(outputWidth * aspectRatio * characterAspect));
}
