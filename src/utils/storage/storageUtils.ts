// src/utils/storage/storageUtils.ts

import { Buffer } from 'node:buffer';
import fs from 'node:fs';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 * @return {void}
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * Writes a buffer to a file at the specified path, creating the parent directory when missing.
 *
 * @param {string} filePath - The path of the file where the data will be written.
 * @param {Uint8Array} data - The bytes to write to the file.
 * @return {void}
 */
export function writeBufferToFile(filePath: string, data: Uint8Array): void {
    ensureOutputDirectory(path.dirname(filePath));
    fs.writeFileSync(filePath, data);
}

/**
 * Reads the entire contents of a file into a buffer.
 *
 * @param {string} filePath - The file path of the file to be read.
 * @returns {Buffer} - The contents of the file.
 */
export function readBufferFromFile(filePath: string): Buffer {
    return fs.readFileSync(filePath);
}

/**
 * Checks if a file or directory exists at the given file path.
 *
 * @param {string} filePath - The path to the file or directory.
 * @return {boolean} Returns true if the file or directory exists, otherwise false.
 */
export function filePathExists(filePath: string): boolean {
    try {
        fs.statSync(filePath);
        return true;
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return false;
        }
        throw error; // Re-throw if it's a different error
    }
}

/**
 * Extracts and returns the lower-cased file extension from a given filename, including the dot.
 * If no extension is found, an empty string is returned.
 */
export function getFileExtension(filename: string): string {
    return path.extname(filename).toLowerCase();
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
