// src/core/renderer/lib/palette.ts

import _ from 'lodash';
import type { Palette } from '../../../@types/index.js';

const LINE_BREAKS = new Set(['\n', '\r']);

/**
 * Turns a palette given as a string or a list of characters into a frozen list of code points.
 * Strings are split by code point, so astral characters stay whole.
 */
export function normalizePalette(input: string | readonly string[]): Palette {
    const entries = typeof input === 'string' ? Array.from(input) : [...input];
    return Object.freeze(entries);
}

/**
 * Returns a description of what is wrong with the palette, or undefined when it is usable.
 */
export function describePaletteProblem(palette: Palette): string | undefined {
    if (palette.length === 0) {
        return 'palette must contain at least one character';
    }
    const position = palette.findIndex((entry) => Array.from(entry).length !== 1 || LINE_BREAKS.has(entry));
    if (position !== -1) {
        return `palette entry at index ${position} must be a single non-line-break character`;
    }
    return undefined;
}

/**
 * Linear bucket of the 0-255 range into `paletteLength` equal-width buckets.
 *
 * @param {number} intensity - Sample intensity in [0, 255].
 * @param {number} paletteLength - Number of buckets, at least 1.
 * @return {number} Palette index in [0, paletteLength - 1].
 */
export function bucketIndex(intensity: number, paletteLength: number): number {
    return _.clamp(Math.floor(intensity / 256 * paletteLength), 0, paletteLength - 1);
}

export function selectCharacter(intensity: number, palette: Palette): string {
    return palette[bucketIndex(intensity, palette.length)];
}
