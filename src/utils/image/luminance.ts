// src/utils/image/luminance.ts

import type { GrayscaleGrid, IRawImageData } from '../../@types/index.js';

// ITU-R 601-2 luma weights in 16-bit fixed point
const RED_WEIGHT = 19595;
const GREEN_WEIGHT = 38470;
const BLUE_WEIGHT = 7471;
const ROUNDING = 0x8000;

/**
 * Converts an RGB triple to a single 8-bit intensity.
 */
export function luminance(r: number, g: number, b: number): number {
    return (r * RED_WEIGHT + g * GREEN_WEIGHT + b * BLUE_WEIGHT + ROUNDING) >> 16;
}

/**
 * Collapses raw interleaved pixels into one intensity per pixel. Grey images (one or two
 * channels) already carry intensity in their first channel; alpha is ignored.
 *
 * @param {IRawImageData} raw - Interleaved pixel data with its layout.
 * @return {GrayscaleGrid} Row-major intensities with the same dimensions.
 */
export function toGrayscaleGrid(raw: IRawImageData): GrayscaleGrid {
    const { width, height, channels } = raw.info;
    const pixelCount = width * height;
    const intensities = new Uint8Array(pixelCount);

    for (let i = 0; i < pixelCount; i++) {
        const offset = i * channels;
        intensities[i] = channels >= 3
            ? luminance(raw.data[offset], raw.data[offset + 1], raw.data[offset + 2])
            : raw.data[offset];
    }

    return { width, height, intensities };
}
