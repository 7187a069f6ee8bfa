// src/config/index.ts

import type { Palette, ResizeKernel } from '../@types/index.js';

export const DEFAULT_PALETTE: Palette = Object.freeze([' ', '.', ':', '-', '=', '+', '*', '#', '%', '@']);

export const SUPPORTED_KERNELS: readonly ResizeKernel[] = ['nearest', 'cubic', 'mitchell', 'lanczos2', 'lanczos3'];

const DEFAULT_KERNEL: ResizeKernel = 'nearest';

export const config = {
    rendering: {
        defaultPalette: DEFAULT_PALETTE,
        defaultOutputWidth: 80,
        characterAspect: 0.55, // A terminal cell is roughly twice as tall as it is wide
        kernel: DEFAULT_KERNEL,
    },
    banner: {
        title: 'GlyphGrid',
        font: 'Standard' as const,
        width: 80,
    },
};
