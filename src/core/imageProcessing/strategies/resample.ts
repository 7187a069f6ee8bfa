// src/core/imageProcessing/strategies/resample.ts

import sharp from 'sharp';
import type { IRawImageData, OutputInfo, ResizeKernel } from '../../../@types/index.js';

/**
 * Shared tail of every strategy: drops alpha, converts to sRGB and resizes to exactly
 * `width` x `height` pixels, ignoring the source aspect ratio.
 */
export async function resampleWithSharp(
    image: sharp.Sharp,
    width: number,
    height: number,
    kernel: ResizeKernel,
): Promise<IRawImageData> {
    const { data, info } = await image
        .removeAlpha()
        .toColourspace('srgb')
        .resize(width, height, { fit: 'fill', kernel })
        .raw()
        .toBuffer({ resolveWithObject: true });

    return { data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength), info: toOutputInfo(info) };
}

function toOutputInfo(info: sharp.OutputInfo): OutputInfo {
    const { width, height, channels } = info;
    return { width, height, channels };
}
