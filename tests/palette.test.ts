import { describe, it, expect } from 'vitest';

import { bucketIndex, describePaletteProblem, normalizePalette, selectCharacter } from '../src/core/renderer/lib/palette.js';
import { assembleAsciiArt } from '../src/core/renderer/lib/assemble.js';
import { DEFAULT_PALETTE } from '../src/config/index.js';

describe('palette', () => {
    describe('bucketIndex', () => {
        it('should split 0-255 into equal-width buckets', () => {
            expect(bucketIndex(0, 10)).toBe(0);
            expect(bucketIndex(25, 10)).toBe(0);
            expect(bucketIndex(26, 10)).toBe(1);
            expect(bucketIndex(128, 10)).toBe(5);
            expect(bucketIndex(255, 10)).toBe(9);
        });

        it('should clamp intensities outside 0-255', () => {
            expect(bucketIndex(-5, 10)).toBe(0);
            expect(bucketIndex(300, 10)).toBe(9);
        });

        it('should never decrease as intensity grows', () => {
            for (let length = 1; length <= 16; length++) {
                let previous = 0;
                for (let intensity = 0; intensity <= 255; intensity++) {
                    const index = bucketIndex(intensity, length);
                    expect(index).toBeGreaterThanOrEqual(previous);
                    expect(index).toBeLessThan(length);
                    previous = index;
                }
            }
        });

        it('should always pick the only entry of a one-character palette', () => {
            for (let intensity = 0; intensity <= 255; intensity++) {
                expect(selectCharacter(intensity, ['#'])).toBe('#');
            }
        });
    });

    describe('normalizePalette', () => {
        it('should split strings by code point', () => {
            expect(normalizePalette(' .:')).toEqual([' ', '.', ':']);
            expect(normalizePalette('\u{1F600}a')).toEqual(['\u{1F600}', 'a']);
        });

        it('should copy arrays without changing them', () => {
            const source = ['a', 'b'];
            const palette = normalizePalette(source);
            expect(palette).toEqual(['a', 'b']);
            expect(palette).not.toBe(source);
            expect(Object.isFrozen(palette)).toBe(true);
        });
    });

    describe('describePaletteProblem', () => {
        it('should accept the default palette', () => {
            expect(describePaletteProblem(DEFAULT_PALETTE)).toBeUndefined();
        });

        it('should reject empty palettes', () => {
            expect(describePaletteProblem([])).toBe('palette must contain at least one character');
        });

        it('should reject multi-character and line-break entries', () => {
            expect(describePaletteProblem(['a', 'bc'])).toBe('palette entry at index 1 must be a single non-line-break character');
            expect(describePaletteProblem(['\n'])).toBe('palette entry at index 0 must be a single non-line-break character');
            expect(describePaletteProblem(['a', ''])).toBe('palette entry at index 1 must be a single non-line-break character');
        });
    });

    describe('assembleAsciiArt', () => {
        it('should lay characters out row-major with a line break after every row', () => {
            const grid = { width: 2, height: 2, intensities: Uint8Array.from([0, 255, 128, 64]) };
            expect(assembleAsciiArt(grid, DEFAULT_PALETTE)).toBe(' @\n+:\n');
        });
    });
});
