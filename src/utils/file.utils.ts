/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import iconv from 'iconv-lite';
import { DEFAULT_IDENTITY_FILE, JSON_INDENT, OUTPUT_EXTENSION } from './constants';
import { stringifyJson } from './json.utils';

// ============================================================================
// READING & WRITING
// ============================================================================

/**
 * Reads a whole file as UTF-8. A leading byte-order mark is stripped.
 */
export function readUtf8File(filePath: string): string {
    const buffer = fs.readFileSync(filePath);
    return iconv.decode(buffer, 'utf8');
}

/**
 * Serialises `data` with two-space indentation, leaving non-ASCII characters
 * unescaped, and writes it in one go. Returns the number of bytes written.
 */
export function writeJsonFile(filePath: string, data: unknown): number {
    const content = stringifyJson(data, JSON_INDENT);
    const buffer = iconv.encode(content, 'utf8');
    fs.writeFileSync(filePath, buffer);
    return buffer.length;
}

// ============================================================================
// PATH HELPERS
// ============================================================================

/**
 * Location of the identity file that sits beside an input file
 */
export function getSiblingIdentityPath(inputPath: string): string {
    return path.join(path.dirname(inputPath), DEFAULT_IDENTITY_FILE);
}

export function findSiblingIdentityFile(inputPath: string): string | undefined {
    const candidate = getSiblingIdentityPath(inputPath);
    return fs.existsSync(candidate) ? candidate : undefined;
}

export function ensureJsonExtension(fileName: string): string {
    return fileName.toLowerCase().endsWith(OUTPUT_EXTENSION) ? fileName : `${fileName}${OUTPUT_EXTENSION}`;
}
