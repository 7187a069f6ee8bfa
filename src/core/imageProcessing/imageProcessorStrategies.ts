// src/core/imageProcessing/imageProcessorStrategies.ts

import type { ImageProcessor } from '../../@types/index.js';
import { JimpImageProcessor } from './strategies/JimpImageProcessor.js';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.js';

/**
 * Enumeration of supported image processing strategies in the order of preference.
 */
export enum SupportedImageProcessorStrategies {
    Sharp = 'sharp',
    Jimp = 'jimp',
}

/**
 * Mapping of image processing strategy identifiers to their corresponding implementations.
 */
export const ImageProcessorStrategyMap: Record<SupportedImageProcessorStrategies, ImageProcessor> = {
    [SupportedImageProcessorStrategies.Sharp]: new SharpImageProcessor(),
    [SupportedImageProcessorStrategies.Jimp]: new JimpImageProcessor(),
};
