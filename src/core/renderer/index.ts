// src/core/renderer/index.ts

import type { IRenderOptions, Palette, RenderResult } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { NoopLogger } from '../../utils/logging/logUtils.js';
import { filePathExists } from '../../utils/storage/storageUtils.js';
import { detectImageProcessorStrategy, getImageProcessor, loadGrayscaleGrid } from '../imageProcessing/processor.js';
import { assembleAsciiArt } from './lib/assemble.js';
import { computeOutputHeight } from './lib/dimensions.js';
import { normalizePalette } from './lib/palette.js';
import { validateRenderParameters } from './lib/validation.js';

/**
 * Converts an image into rows of palette characters, one character per cell of a grid
 * `outputWidth` wide. Anticipated failures are returned as values, never thrown.
 *
 * @param {string} imagePath - Path of the image to convert.
 * @param {number} outputWidth - Characters per row.
 * @param {string | Palette} palette - Characters ordered brightest to darkest; index 0 is used for the lowest intensities.
 * @param {IRenderOptions} options - Logger, image processor, resize kernel and character aspect overrides.
 *   Without a processor, one is picked from the file's leading bytes.
 * @return {Promise<RenderResult>} The art, or the reason it could not be produced.
 */
export async function render(
    imagePath: string,
    outputWidth: number = config.rendering.defaultOutputWidth,
    palette: string | Palette = config.rendering.defaultPalette,
    options: IRenderOptions = {},
): Promise<RenderResult> {
    const logger = options.logger ?? NoopLogger;
    const kernel = options.kernel ?? config.rendering.kernel;
    const characterAspect = options.characterAspect ?? config.rendering.characterAspect;
    const characters = normalizePalette(palette);

    const invalid = validateRenderParameters(imagePath, outputWidth, characters, characterAspect);
    if (invalid) {
        logger.debug(`Rejected parameters: ${invalid.kind}`);
        return { ok: false, error: invalid };
    }

    if (!filePathExists(imagePath)) {
        logger.debug(`No file at ${imagePath}`);
        return { ok: false, error: { kind: 'NotFound', path: imagePath } };
    }

    try {
        const processor = options.processor ?? getImageProcessor(await detectImageProcessorStrategy(imagePath));
        const source = await processor.readDimensions(imagePath);
        if (source.width < 1 || source.height < 1) {
            throw new Error(`image reports no usable size (${source.width}x${source.height})`);
        }
        const outputHeight = computeOutputHeight(outputWidth, source, characterAspect);
        logger.debug(`Source ${source.width}x${source.height} -> grid ${outputWidth}x${outputHeight}`);

        const grid = await loadGrayscaleGrid(imagePath, outputWidth, outputHeight, kernel, processor);
        return { ok: true, value: assembleAsciiArt(grid, characters) };
    } catch (cause) {
        logger.debug(`Decoding ${imagePath} failed: ${cause}`);
        return { ok: false, error: { kind: 'DecodeError', path: imagePath, cause } };
    }
}
