import path from "node:path";
import type * as readline from 'readline';
import type { ExportSummary, IdentityMapping, JsonValue } from '../types';
import { formatDisplayName } from '../analysis/display-name.formatter';
import { loadConversationDocument } from '../parsers/conversation-document.parser';
import { DEFAULT_INPUT_FILE } from '../utils/constants';
import { ensureJsonExtension } from '../utils/file.utils';
import { isConversationFilterError } from '../utils/errors';
import {
    ASCII_LOGO,
    askQuestion,
    askUserSelection,
    askYesNo,
    createReadlineInterface,
    logHeader,
    logInfo,
    logSuccess,
    reportError,
    reportIdentitySource,
    showExportSummary,
    showUserMenu,
    type UserListEntry
} from './cli.utils';
import { listUsers, resolveIdentities, selectExportConversations, writeUserConversations } from './file-processor';
import { getDefaultOutputFileName } from './output';

// ============================================================================
// INTERACTIVE CLI MAIN LOGIC
// ============================================================================

/**
 * Walks the operator through loading an export, picking a user and writing the
 * filtered file. Resolves to the process exit code.
 */
export async function runInteractiveCLI(rl: readline.Interface = createReadlineInterface()): Promise<number> {
    rl.on('SIGINT', () => {
        console.log("\n\nOperation cancelled by user.");
        rl.close();
        process.exit(130);
    });

    try {
        console.log(ASCII_LOGO);
        return await runSession(rl);
    } catch (error) {
        reportError(error);
        return 1;
    } finally {
        rl.close();
    }
}

async function runSession(rl: readline.Interface): Promise<number> {
    // Step 1: Load the export
    const inputPath = (await askQuestion(rl, "Enter path to the conversations JSON file: ")) || DEFAULT_INPUT_FILE;

    logInfo(`Loading conversations from '${inputPath}'...`);
    const document = loadConversationDocument(inputPath);

    // Step 2: Optional user info
    const usersPath = await askQuestion(rl, "Enter path to users.json file (optional, press Enter to skip): ");
    const identitySource = resolveIdentities(inputPath, usersPath || undefined);
    reportIdentitySource(identitySource, !usersPath);
    const { identities } = identitySource;

    // Step 3: Pick a user
    logHeader("USERS");
    let users: UserListEntry[];
    try {
        users = listUsers(document, identities);
    } catch (error) {
        return reportNothingToExport(error);
    }
    showUserMenu(users);

    const selectedIndex = await askUserSelection(rl, users.length);
    if (selectedIndex === undefined) {
        logInfo("Goodbye!");
        return 0;
    }
    const selected = users[selectedIndex];
    logInfo(`Selected user: ${selected.displayName}`);

    // Step 4: Filter before asking anything about the output
    let conversations: JsonValue[];
    try {
        conversations = selectExportConversations(document, selected.id);
    } catch (error) {
        return reportNothingToExport(error);
    }

    // Step 5: Output options
    return await exportSelection(rl, conversations, identities, selected.id);
}

async function exportSelection(
    rl: readline.Interface,
    conversations: JsonValue[],
    identities: IdentityMapping,
    userId: string
): Promise<number> {
    const defaultName = getDefaultOutputFileName(userId, identities);
    const customName = await askQuestion(rl, `Output filename (default: ${defaultName}): `);
    const outputPath = ensureJsonExtension(customName || defaultName);

    const includeHeader = await askYesNo(
        rl,
        "Include header metadata (user info, export date, count)? (y/n, default: y): ",
        true
    );

    logHeader("EXPORTING");
    const summary: ExportSummary = writeUserConversations({
        conversations,
        userId,
        identities,
        outputPath,
        includeHeader
    });

    showExportSummary(summary, formatDisplayName(userId, identities), userId);
    console.log();
    logSuccess(`File saved successfully! (${path.resolve(summary.outputPath)})`);
    return 0;
}

/**
 * An export with nothing in it is a normal outcome, not a failure
 */
function reportNothingToExport(error: unknown): number {
    if (isConversationFilterError(error)
        && (error.code === "NO_USERS_FOUND" || error.code === "NO_MATCHING_CONVERSATIONS")) {
        logInfo(error.message);
        return 0;
    }
    throw error;
}
