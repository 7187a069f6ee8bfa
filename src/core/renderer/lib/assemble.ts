// src/core/renderer/lib/assemble.ts

import _ from 'lodash';
import type { GrayscaleGrid, Palette } from '../../../@types/index.js';
import { selectCharacter } from './palette.js';

/**
 * Maps each intensity to its palette character and lays them out row-major,
 * terminating every row (the last one included) with a line break.
 */
export function assembleAsciiArt(grid: GrayscaleGrid, palette: Palette): string {
    const rows = _.chunk(Array.from(grid.intensities), grid.width);
    return rows
        .map((row) => row.map((intensity) => selectCharacter(intensity, palette)).join('') + '\n')
        .join('');
}
