// src/core/renderer/lib/validation.ts

import type { Palette, RenderError } from '../../../@types/index.js';
import { describePaletteProblem } from './palette.js';

export function validateRenderParameters(
    imagePath: string,
    outputWidth: number,
    palette: Palette,
    characterAspect: number,
): RenderError | undefined {
    if (imagePath.length === 0) {
        return { kind: 'InvalidParameter', parameter: 'imagePath', message: 'image path must not be empty' };
    }
    if (!Number.isInteger(outputWidth) || outputWidth < 1) {
        return {
            kind: 'InvalidParameter',
            parameter: 'outputWidth',
            message: `output width must be a positive integer, got ${outputWidth}`,
        };
    }
    const paletteProblem = describePaletteProblem(palette);
    if (paletteProblem) {
        return { kind: 'InvalidParameter', parameter: 'palette', message: paletteProblem };
    }
    if (!Number.isFinite(characterAspect) || characterAspect <= 0) {
        return {
            kind: 'InvalidParameter',
            parameter: 'characterAspect',
            message: `character aspect must be a positive finite number, got ${characterAspect}`,
        };
    }
    return undefined;
}
