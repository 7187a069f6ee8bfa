// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ImageDimensions, ImageProcessor, IRawImageData, ResizeKernel } from '../../../@types/index.js';
import { resampleWithSharp } from './resample.js';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Reads the pixel dimensions of an image without decoding its pixels.
     * Multi-frame images report the size of a single frame.
     */
    public async readDimensions(imagePath: string): Promise<ImageDimensions> {
        const meta = await sharp(imagePath).metadata();
        const width = meta.width ?? 0;
        const pageHeight = meta.pageHeight ?? meta.height ?? 0;
        return { width, height: pageHeight };
    }

    /**
     * Decodes the first frame of an image and resamples it to the requested grid.
     *
     * @param {string} imagePath - The file path of the image to be processed.
     * @param {number} width - Target width in pixels.
     * @param {number} height - Target height in pixels.
     * @param {ResizeKernel} kernel - The resampling kernel used by the resize.
     * @return {Promise<IRawImageData>} Raw interleaved pixels and their layout.
     */
    public async resampleToRgb(
        imagePath: string,
        width: number,
        height: number,
        kernel: ResizeKernel,
    ): Promise<IRawImageData> {
        return await resampleWithSharp(sharp(imagePath, { pages: 1 }), width, height, kernel);
    }
}
