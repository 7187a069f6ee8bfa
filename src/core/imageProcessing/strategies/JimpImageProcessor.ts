// src/core/imageProcessing/strategies/JimpImageProcessor.ts

import { Jimp } from 'jimp';
import sharp from 'sharp';
import type { ImageDimensions, ImageProcessor, IRawImageData, ResizeKernel } from '../../../@types/index.js';
import { resampleWithSharp } from './resample.js';

// Bitmap decoders disagree on the alpha of 24-bit files; keep colour only
function dropAlpha(rgba: Uint8Array, pixelCount: number): Uint8Array {
    const rgb = new Uint8Array(pixelCount * 3);
    for (let i = 0; i < pixelCount; i++) {
        rgb[i * 3] = rgba[i * 4];
        rgb[i * 3 + 1] = rgba[i * 4 + 1];
        rgb[i * 3 + 2] = rgba[i * 4 + 2];
    }
    return rgb;
}

/**
 * Decodes formats libvips is built without (BMP) in JavaScript, then hands the RGBA
 * pixels to sharp so the resize behaves exactly like the sharp strategy.
 */
export class JimpImageProcessor implements ImageProcessor {
    public async readDimensions(imagePath: string): Promise<ImageDimensions> {
        const image = await Jimp.read(imagePath);
        return { width: image.bitmap.width, height: image.bitmap.height };
    }

    public async resampleToRgb(
        imagePath: string,
        width: number,
        height: number,
        kernel: ResizeKernel,
    ): Promise<IRawImageData> {
        const { data, width: sourceWidth, height: sourceHeight } = (await Jimp.read(imagePath)).bitmap;
        const decoded = sharp(dropAlpha(data, sourceWidth * sourceHeight), {
            raw: { width: sourceWidth, height: sourceHeight, channels: 3 },
        });
        return await resampleWithSharp(decoded, width, height, kernel);
    }
}
