/**
 * CLI Utilities for enhanced user experience
 */

import * as readline from 'readline';
import type { ExportSummary, IdentitySource } from '../types';
import { isConversationFilterError } from '../utils/errors';
import { padEndGraphemes, padStartGraphemes, truncateText } from '../utils/text.utils';

// ============================================================================
// ASCII ART & BRANDING
// ============================================================================

export const ASCII_LOGO = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║                  CONVERSATION  FILTER                      ║
║                                                            ║
║        Split a conversation export down to one user        ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString();
}

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), sizes.length - 1);
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

export function logSubHeader(message: string): void {
    console.log(`\n${colorize('▶ ' + message, 'magenta')}`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right';
}

/**
 * Renders rows as a box-drawn table. Cells wider than their column are cut with "...".
 */
export function renderTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => padEndGraphemes(col.header, col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');

    const lines = [
        `┌─${separator}─┐`,
        `│ ${colorize(headerRow, 'bright')} │`,
        `├─${separator}─┤`
    ];

    for (const row of data) {
        const formattedRow = columns.map((col, i) => {
            const truncated = truncateText(row[i] ?? '', col.width);
            return col.align === 'right'
                ? padStartGraphemes(truncated, col.width)
                : padEndGraphemes(truncated, col.width);
        }).join(' │ ');
        lines.push(`│ ${formattedRow} │`);
    }

    lines.push(`└─${separator}─┘`);
    return lines;
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    for (const line of renderTable(columns, data)) {
        console.log(line);
    }
}

// ============================================================================
// USER LISTING
// ============================================================================

export type UserListEntry = {
    id: string;
    displayName: string;
    conversationCount: number;
};

export function showUserTable(users: UserListEntry[]): void {
    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'User', width: 40, align: 'left' },
            { header: 'Conversations', width: 13, align: 'right' },
            { header: 'ID', width: 36, align: 'left' }
        ],
        users.map((user, index) => [
            (index + 1).toString(),
            user.displayName,
            formatNumber(user.conversationCount),
            user.id
        ])
    );
}

export function showUserMenu(users: UserListEntry[]): void {
    console.log(`\n${colorize(`Found ${users.length} user(s):`, 'bright')}`);
    console.log(colorize('─'.repeat(60), 'cyan'));

    users.forEach((user, index) => {
        console.log(`${colorize(`${index + 1}.`, 'cyan')} ${user.displayName}`);
        console.log(`   ${colorize('└──', 'dim')} ${formatNumber(user.conversationCount)} conversations | ID: ${user.id}`);
        console.log();
    });
}

export function showExportSummary(summary: ExportSummary, displayName: string, userId: string): void {
    console.log();
    logSuccess(`Exported ${formatNumber(summary.conversationCount)} conversations to '${summary.outputPath}'`);
    if (!summary.includeHeader) {
        logInfo("Header metadata excluded");
    }

    console.log();
    console.log(`${colorize('Summary:', 'bright')}`);
    console.log(`  ${colorize('User:', 'cyan')} ${displayName}`);
    console.log(`  ${colorize('User ID:', 'cyan')} ${userId}`);
    console.log(`  ${colorize('Conversations:', 'cyan')} ${formatNumber(summary.conversationCount)}`);
    console.log(`  ${colorize('Output file:', 'cyan')} ${summary.outputPath} (${formatBytes(summary.bytesWritten)})`);
}

export function reportIdentitySource(source: IdentitySource, discovered: boolean): void {
    if (source.path) {
        logInfo(discovered
            ? `Found ${source.path}, loading user information...`
            : `Loading user information from '${source.path}'...`);
    }
    if (source.note) logInfo(source.note);
    if (source.warning) logWarning(source.warning);
    if (source.identities.size > 0) {
        logSuccess(`Loaded ${formatNumber(source.identities.size)} user record(s)`);
    }
}

// ============================================================================
// USAGE HELPER
// ============================================================================

export function showUsage(): void {
    console.log(ASCII_LOGO);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('conversation-filter', 'cyan')} ${colorize('[options]', 'yellow')} ${colorize('[conversations.json]', 'dim')}`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--interactive, -i', 'cyan')}    Launch interactive mode (default if no arguments)`);
    console.log(`  ${colorize('--input <path>', 'cyan')}       Conversation export to read`);
    console.log(`  ${colorize('--users <path>', 'cyan')}       User info file (default: users.json beside the input)`);
    console.log(`  ${colorize('--list', 'cyan')}               List users and their conversation counts`);
    console.log(`  ${colorize('--user <id>', 'cyan')}          Export the conversations of this user`);
    console.log(`  ${colorize('--output <path>', 'cyan')}      Output file (default: claude_conversations_<user>_<timestamp>.json)`);
    console.log(`  ${colorize('--no-header', 'cyan')}          Write the bare conversation list without metadata`);
    console.log(`  ${colorize('--help, -h', 'cyan')}           Show this help message`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('conversation-filter', 'cyan')}                                       # Launch interactive mode`);
    console.log(`  ${colorize('conversation-filter --list ./conversations.json', 'cyan')}           # Show users`);
    console.log(`  ${colorize('conversation-filter ./conversations.json --user <id>', 'cyan')}      # Export one user`);
    console.log(`  ${colorize('conversation-filter ./conversations.json --user <id> --no-header', 'cyan')}`);
    console.log();

    console.log(`${colorize('SUPPORTED FORMATS:', 'bright')}`);
    console.log(`  ${colorize('Individual', 'green')}   Conversations with 'user_id' and 'messages'`);
    console.log(`  ${colorize('Team', 'magenta')}         Conversations with 'account' and 'chat_messages'`);
    console.log(`  ${colorize('Keyed', 'blue')}        An object keyed by user ID`);
    console.log();
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
}

export function reportError(error: unknown): void {
    if (isConversationFilterError(error)) {
        showError(error.message, error.details);
        return;
    }
    showError("Unexpected error", error instanceof Error ? error.message : String(error));
}

// ============================================================================
// INTERACTIVE CLI UTILITIES
// ============================================================================

export function createReadlineInterface(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): readline.Interface {
    return readline.createInterface({ input, output });
}

export function askQuestion(rl: readline.Interface, question: string): Promise<string> {
    return new Promise((resolve) => {
        rl.question(`${colorize('?', 'cyan')} ${question}`, (answer) => {
            resolve(answer.trim());
        });
    });
}

export type SelectionAnswer =
    | { kind: 'quit' }
    | { kind: 'selected'; index: number }
    | { kind: 'out-of-range' }
    | { kind: 'invalid' };

/**
 * Interprets a menu answer: `q` quits, a whole number from 1 to `count` selects
 */
export function parseSelection(answer: string, count: number): SelectionAnswer {
    const trimmed = answer.trim();
    if (trimmed.toLowerCase() === 'q') {
        return { kind: 'quit' };
    }
    if (!/^[+-]?\d+$/.test(trimmed)) {
        return { kind: 'invalid' };
    }
    const index = parseInt(trimmed, 10) - 1;
    if (index >= 0 && index < count) {
        return { kind: 'selected', index };
    }
    return { kind: 'out-of-range' };
}

/**
 * Interprets a yes/no answer; an empty answer takes the default
 */
export function parseYesNo(answer: string, defaultValue: boolean): boolean | undefined {
    const normalised = answer.trim().toLowerCase();
    if (normalised === '') return defaultValue;
    if (normalised === 'y' || normalised === 'yes') return true;
    if (normalised === 'n' || normalised === 'no') return false;
    return undefined;
}

export async function askUserSelection(rl: readline.Interface, count: number): Promise<number | undefined> {
    while (true) {
        const answer = parseSelection(await askQuestion(rl, `Select user (1-${count}) or 'q' to quit: `), count);
        switch (answer.kind) {
            case 'quit':
                return undefined;
            case 'selected':
                return answer.index;
            case 'out-of-range':
                logError(`Please enter a number between 1 and ${count}`);
                break;
            case 'invalid':
                logError("Please enter a valid number or 'q' to quit");
                break;
        }
    }
}

export async function askYesNo(rl: readline.Interface, question: string, defaultValue: boolean): Promise<boolean> {
    while (true) {
        const answer = parseYesNo(await askQuestion(rl, question), defaultValue);
        if (answer !== undefined) {
            return answer;
        }
        logError("Please enter 'y' for yes or 'n' for no");
    }
}
