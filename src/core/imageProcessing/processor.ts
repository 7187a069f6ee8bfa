// src/core/imageProcessing/processor.ts

import type { GrayscaleGrid, ImageProcessor, ResizeKernel } from '../../@types/index.js';
import { toGrayscaleGrid } from '../../utils/image/luminance.js';
import { readFileHeader } from '../../utils/storage/storageUtils.js';
import { ImageProcessorStrategyMap, SupportedImageProcessorStrategies } from './imageProcessorStrategies.js';

// Windows bitmap files start with "BM"
const BMP_SIGNATURE = [0x42, 0x4d];

export function getImageProcessor(
    strategy: SupportedImageProcessorStrategies = SupportedImageProcessorStrategies.Sharp,
): ImageProcessor {
    return ImageProcessorStrategyMap[strategy];
}

/**
 * Picks the strategy able to decode a file by looking at its leading bytes.
 *
 * @param {string} imagePath - The file to inspect.
 * @return {Promise<SupportedImageProcessorStrategies>} Jimp for bitmaps, sharp for everything else.
 */
export async function detectImageProcessorStrategy(imagePath: string): Promise<SupportedImageProcessorStrategies> {
    const header = await readFileHeader(imagePath, BMP_SIGNATURE.length);
    const isBitmap = BMP_SIGNATURE.every((byte, index) => header[index] === byte);
    return isBitmap ? SupportedImageProcessorStrategies.Jimp : SupportedImageProcessorStrategies.Sharp;
}

/**
 * Resamples an image to the requested grid and converts every sample to an 8-bit intensity.
 *
 * @param {string} imagePath - The file path of the image to be loaded.
 * @param {number} width - Number of columns in the grid.
 * @param {number} height - Number of rows in the grid.
 * @param {ResizeKernel} kernel - The resampling kernel used by the resize.
 * @param {ImageProcessor} processor - The strategy doing the decode and resize.
 * @return {Promise<GrayscaleGrid>} A promise that resolves to the intensity grid.
 */
export async function loadGrayscaleGrid(
    imagePath: string,
    width: number,
    height: number,
    kernel: ResizeKernel,
    processor: ImageProcessor = getImageProcessor(),
): Promise<GrayscaleGrid> {
    const raw = await processor.resampleToRgb(imagePath, width, height, kernel);
    return toGrayscaleGrid(raw);
}
