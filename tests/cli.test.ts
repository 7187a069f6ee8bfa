import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCli, runMain } from '../src/cli/index.js';
import type { ICliIO } from '../src/@types/index.js';
import { writeSolidPng } from './helpers/testImages.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const outputFolder = path.join(__dirname, 'test_output', 'cli');

function captureIO(): ICliIO & { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        out: (text) => {
            stdout.push(text);
        },
        err: (text) => {
            stderr.push(text);
        },
    };
}

describe('cli', () => {
    const whitePath = path.join(outputFolder, 'white_200x100.png');
    const brokenPath = path.join(outputFolder, 'broken.png');

    beforeAll(async () => {
        fs.mkdirSync(outputFolder, { recursive: true });
        await writeSolidPng(whitePath, 200, 100, [255, 255, 255]);
        fs.writeFileSync(brokenPath, 'this is not an image');
    });

    afterAll(() => {
        fs.rmSync(outputFolder, { recursive: true, force: true });
    });

    it('should print the art and exit with 0', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '--width', '10', '--no-banner'], io);

        expect(code).toBe(0);
        expect(io.stdout.join('')).toBe('@@@@@@@@@@\n@@@@@@@@@@\n');
        expect(io.stderr).toEqual([]);
    });

    it('should use a custom palette', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '-w', '4', '-c', 'xy', '--no-banner'], io);

        expect(code).toBe(0);
        expect(io.stdout.join('')).toBe('yyyy\n');
    });

    it('should reverse the palette on request', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '-w', '4', '--reverse', '--no-banner'], io);

        expect(code).toBe(0);
        expect(io.stdout.join('')).toBe('    \n');
    });

    it('should surround the art with the banner and suggestions by default', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '-w', '4'], io);

        expect(code).toBe(0);
        expect(io.stdout).toHaveLength(3);
        expect(io.stdout[1]).toBe('@@@@\n');
        expect(io.stdout[2]).toContain('Ideas for taking this further:');
    });

    it('should report missing images and exit with 1', async () => {
        const io = captureIO();
        const missing = path.join(outputFolder, 'missing.png');
        const code = await runCli([missing, '--no-banner'], io);

        expect(code).toBe(1);
        expect(io.stdout).toEqual([]);
        expect(io.stderr).toEqual([`Error: Image '${missing}' not found.\n`]);
    });

    it('should reject a non-positive width', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '--width', '0', '--no-banner'], io);

        expect(code).toBe(1);
        expect(io.stderr.join('')).toContain('Width must be a positive integer.');
    });

    it('should reject unknown kernels', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '--kernel', 'bogus', '--no-banner'], io);

        expect(code).toBe(1);
        expect(io.stderr.join('')).toContain('Allowed choices are nearest, cubic, mitchell, lanczos2, lanczos3.');
    });

    it('should report an empty palette as an invalid parameter', async () => {
        const io = captureIO();
        const code = await runCli([whitePath, '--palette', '', '--no-banner'], io);

        expect(code).toBe(1);
        expect(io.stderr).toEqual(['Error: Invalid palette: palette must contain at least one character\n']);
    });

    it('should report undecodable images and exit with 1', async () => {
        const io = captureIO();
        const code = await runCli([brokenPath, '--no-banner'], io);

        expect(code).toBe(1);
        expect(io.stdout).toEqual([]);
        expect(io.stderr).toHaveLength(1);
        expect(io.stderr[0].startsWith(`Error: Could not decode image '${brokenPath}': `)).toBe(true);
        expect(io.stderr[0].endsWith('\n')).toBe(true);
    });

    it.each([
        ['an embedded NUL byte', 'a\0b.png'],
        ['a name longer than the filesystem allows', 'x'.repeat(5000) + '.png'],
    ])('should report a path with %s as missing and exit with 1', async (_label, badPath) => {
        const io = captureIO();
        const code = await runCli([badPath, '--no-banner'], io);

        expect(code).toBe(1);
        expect(io.stderr).toEqual([`Error: Image '${path.resolve(badPath)}' not found.\n`]);
    });

    describe('runMain', () => {
        afterEach(() => {
            process.exitCode = undefined;
        });

        it('should record a successful run as exit code 0', async () => {
            const io = captureIO();
            await runMain(['node', 'glyphgrid', whitePath, '-w', '4', '--no-banner'], io);

            expect(process.exitCode).toBe(0);
            expect(io.stdout).toEqual(['@@@@\n']);
        });

        it('should record a failed run as exit code 1', async () => {
            const io = captureIO();
            await runMain(['node', 'glyphgrid', path.join(outputFolder, 'missing.png'), '--no-banner'], io);

            expect(process.exitCode).toBe(1);
        });
    });
});
