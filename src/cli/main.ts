import { formatDisplayName } from '../analysis/display-name.formatter';
import { loadConversationDocument } from '../parsers/conversation-document.parser';
import { ConversationFilterError } from '../utils/errors';
import { ensureJsonExtension } from '../utils/file.utils';
import { parseCliArgs, type CliArgs } from './args';
import {
    ASCII_LOGO,
    logHeader,
    logInfo,
    logSubHeader,
    reportError,
    reportIdentitySource,
    showError,
    showExportSummary,
    showUsage,
    showUserTable
} from './cli.utils';
import { exportUserConversations, listUsers, resolveIdentities } from './file-processor';
import { runInteractiveCLI } from './interactive';
import { getDefaultOutputFileName } from './output';

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function. Takes the full `process.argv` and resolves to the
 * exit code.
 */
export async function runCLI(argv: string[]): Promise<number> {
    const rawArgs = argv.slice(2);

    let args: CliArgs;
    try {
        args = parseCliArgs(rawArgs);
    } catch (error) {
        reportError(error);
        return 1;
    }

    if (args.help) {
        showUsage();
        return 0;
    }

    if (args.interactive || rawArgs.length === 0) {
        return runInteractiveCLI();
    }

    if (!args.input) {
        showError("An input file is required", "Pass it as the first argument or with --input <path>.");
        return 1;
    }
    if (!args.list && !args.user) {
        showError("Nothing to do", "Pass --list to see the users, or --user <id> to export one.");
        return 1;
    }

    console.log(ASCII_LOGO);

    try {
        runBatch(args.input, args);
        return 0;
    } catch (error) {
        reportError(error);
        return 1;
    }
}

function runBatch(inputPath: string, args: CliArgs): void {
    // Step 1: Load the export and user info
    logHeader("LOADING");
    logInfo(`Loading conversations from '${inputPath}'...`);
    const document = loadConversationDocument(inputPath);

    const identitySource = resolveIdentities(inputPath, args.users);
    reportIdentitySource(identitySource, args.users === undefined);
    const { identities } = identitySource;

    // Step 2: Users
    const users = listUsers(document, identities);

    if (args.list) {
        logSubHeader(`Found ${users.length} user(s)`);
        showUserTable(users);
    }

    if (args.user === undefined) {
        return;
    }

    // Step 3: Export
    const userId = args.user;
    if (!users.some(user => user.id === userId)) {
        throw new ConversationFilterError(
            "UNKNOWN_USER",
            `User '${userId}' does not appear in the conversation data.`,
            "Run with --list to see the available users."
        );
    }

    logHeader("EXPORTING");
    const outputPath = ensureJsonExtension(args.output ?? getDefaultOutputFileName(userId, identities));
    const summary = exportUserConversations({
        document,
        userId,
        identities,
        outputPath,
        includeHeader: args.includeHeader
    });

    showExportSummary(summary, formatDisplayName(userId, identities), userId);
}
