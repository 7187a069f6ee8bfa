// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import { open } from 'node:fs/promises';
import { Buffer } from 'node:buffer';

/**
 * Checks if a regular file exists at the given path and can be reached. Paths the
 * filesystem refuses to resolve (embedded NUL, too long, symlink loops, no permission)
 * count as missing.
 *
 * @param {string} filePath - The path to check.
 * @return {boolean} Returns true if a file exists, otherwise false.
 */
export function filePathExists(filePath: string): boolean {
    try {
        return fs.statSync(filePath).isFile();
    } catch {
        return false;
    }
}

/**
 * Reads up to `length` bytes from the start of a file.
 *
 * @param {string} filePath - The file to read from.
 * @param {number} length - Maximum number of bytes to read.
 * @return {Promise<Buffer>} The bytes read, shorter than `length` for small files.
 */
export async function readFileHeader(filePath: string, length: number): Promise<Buffer> {
    const handle = await open(filePath, 'r');
    try {
        const header = Buffer.alloc(length);
        const { bytesRead } = await handle.read(header, 0, length, 0);
        return header.subarray(0, bytesRead);
    } finally {
        await handle.close();
    }
}
