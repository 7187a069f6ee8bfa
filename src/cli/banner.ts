// src/cli/banner.ts

import figlet from 'figlet';
import { rainbow } from 'gradient-string';
import { config } from '../config/index.js';

export const SUGGESTIONS: readonly string[] = [
    'GIF animation: play every frame of a GIF in place, one after another.',
    'Colour: tint each character with ANSI colour codes taken from the source pixel.',
    'Custom palettes: try --palette with your own characters, brightest first.',
    'Web interface: upload an image in the browser and view the art there.',
    'Camera input: convert a live webcam feed frame by frame.',
    'Image filters: adjust contrast, brightness or edges before converting.',
];

export function renderBanner(): string {
    const title = figlet.textSync(config.banner.title, {
        font: config.banner.font,
        horizontalLayout: 'default',
        verticalLayout: 'default',
        width: config.banner.width,
        whitespaceBreak: true,
    });
    return `${rainbow.multiline(title)}\n${rainbow('Turns images into text, one character per cell.')}\n`;
}

export function renderSuggestions(): string {
    const lines = SUGGESTIONS.map((idea) => `- ${idea}`);
    return ['', 'Ideas for taking this further:', ...lines, ''].join('\n');
}
