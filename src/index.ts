/**
 * Conversation Filter - Main Entry Point
 *
 * Reads an exported conversation archive, lists the users found in it and writes
 * the conversations of one chosen user to a new JSON file.
 *
 * Usage:
 *  npx tsx src/index.ts
 *  npx tsx src/index.ts conversations.json --user <id>
 */

import { fileURLToPath } from "node:url";
import path from "node:path";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Checks if this script is being run directly (not imported as a module)
 */
function isMainModule(): boolean {
    const thisFile = fileURLToPath(import.meta.url);
    return !!process.argv[1] && path.resolve(process.argv[1]) === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
    runCLI(process.argv)
        .then((exitCode) => {
            process.exitCode = exitCode;
        })
        .catch((error: unknown) => {
            console.error("❌ Unexpected error:", error);
            process.exit(1);
        });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

export * from './types';
export * from './parsers';
export * from './analysis';
export * from './utils';
export * from './cli';
