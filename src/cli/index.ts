// src/cli/index.ts

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import path from 'node:path';
import type { ICliIO, ResizeKernel } from '../@types/index.js';
import { config, SUPPORTED_KERNELS } from '../config/index.js';
import { render } from '../core/renderer/index.js';
import { formatRenderError } from '../core/renderer/errors.js';
import { normalizePalette } from '../core/renderer/lib/palette.js';
import { createLogger, NoopLogFacility } from '../utils/logging/logUtils.js';
import { filePathExists } from '../utils/storage/storageUtils.js';
import { renderBanner, renderSuggestions } from './banner.js';

interface ICliOptions {
    width: number;
    palette?: string;
    reverse?: boolean;
    kernel: ResizeKernel;
    banner: boolean;
    log?: boolean;
    verbose?: boolean;
}

const processIO: ICliIO = {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
};

function parseWidth(value: string): number {
    const width = Number(value);
    if (!Number.isInteger(width) || width < 1) {
        throw new InvalidArgumentError('Width must be a positive integer.');
    }
    return width;
}

function isResizeKernel(value: string): value is ResizeKernel {
    return SUPPORTED_KERNELS.some((kernel) => kernel === value);
}

function parseKernel(value: string): ResizeKernel {
    if (!isResizeKernel(value)) {
        throw new InvalidArgumentError(`Allowed choices are ${SUPPORTED_KERNELS.join(', ')}.`);
    }
    return value;
}

/**
 * Builds the command line program. The action records its exit code through `setExitCode`
 * instead of exiting, so the program can run inside tests.
 */
export function createProgram(io: ICliIO, setExitCode: (code: number) => void): Command {
    const program = new Command();
    program
        .name('glyphgrid')
        .description('Convert an image into ASCII art')
        .version('1.0.0')
        .argument('<image>', 'Path of the image to convert')
        .option('-w, --width <number>', `Characters per row (Default: ${config.rendering.defaultOutputWidth})`, parseWidth, config.rendering.defaultOutputWidth)
        .option('-c, --palette <chars>', 'Characters ordered brightest to darkest')
        .option('-r, --reverse', 'Reverse the palette, for light terminal backgrounds')
        .addOption(
            new Option('-k, --kernel <kernel>', `Resampling kernel used when resizing (${SUPPORTED_KERNELS.join(', ')})`)
                .argParser(parseKernel)
                .default(config.rendering.kernel),
        )
        .option('--no-banner', 'Skip the welcome banner and closing suggestions')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .configureOutput({
            writeOut: (text) => io.out(text),
            writeErr: (text) => io.err(text),
        })
        .exitOverride()
        .showHelpAfterError()
        .action(async (image: string, options: ICliOptions) => {
            const logger = createLogger('cli', options.log ? console : NoopLogFacility, options.verbose ?? false);
            const imagePath = path.resolve(image);

            if (options.banner) {
                io.out(renderBanner());
            }

            if (!filePathExists(imagePath)) {
                logger.error(`Image not found: ${imagePath}`);
                io.err(`Error: Image '${imagePath}' not found.\n`);
                setExitCode(1);
                return;
            }

            const basePalette = normalizePalette(options.palette ?? config.rendering.defaultPalette);
            const palette = options.reverse ? [...basePalette].reverse() : basePalette;

            logger.info(`Converting ${imagePath} at ${options.width} characters per row`);
            const result = await render(imagePath, options.width, palette, { logger, kernel: options.kernel });
            if (!result.ok) {
                logger.error(`Conversion failed: ${result.error.kind}`);
                io.err(`Error: ${formatRenderError(result.error)}\n`);
                setExitCode(1);
                return;
            }

            io.out(result.value);
            if (options.banner) {
                io.out(renderSuggestions());
            }
            logger.success('Conversion complete');
            setExitCode(0);
        });
    return program;
}

/**
 * Runs the program against user arguments (without the node and script entries).
 *
 * @param {string[]} args - Arguments as typed on the command line.
 * @param {ICliIO} io - Where output and errors are written.
 * @return {Promise<number>} The process exit code.
 */
export async function runCli(args: string[], io: ICliIO = processIO): Promise<number> {
    let exitCode = 0;
    const program = createProgram(io, (code) => {
        exitCode = code;
    });
    try {
        await program.parseAsync(args, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }
    return exitCode;
}

/**
 * Entry point for the installed binary: runs the program and records its exit code on the process.
 */
export async function runMain(argv: string[] = process.argv, io: ICliIO = processIO): Promise<void> {
    process.exitCode = await runCli(argv.slice(2), io);
}
