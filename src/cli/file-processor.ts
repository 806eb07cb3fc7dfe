import type {
    ConversationDocument,
    ExportSummary,
    IdentityMapping,
    IdentitySource,
    JsonValue,
    UserIdentifier
} from '../types';
import { countUserConversations } from '../analysis/conversation.counter';
import { filterUserConversations } from '../analysis/conversation.filter';
import { formatDisplayName } from '../analysis/display-name.formatter';
import { extractUsers } from '../analysis/user.extractor';
import { loadIdentityFile } from '../parsers/identity.parser';
import { ConversationFilterError, describeError } from '../utils/errors';
import { findSiblingIdentityFile, writeJsonFile } from '../utils/file.utils';
import type { UserListEntry } from './cli.utils';
import { buildExportPayload } from './output';

// ============================================================================
// FILE PROCESSING
// ============================================================================

/**
 * Loads identities from `usersPath`, or from a users.json beside the input when no
 * path was given. Missing sources give an empty mapping.
 */
export function resolveIdentities(inputPath: string, usersPath?: string): IdentitySource {
    const source = usersPath || findSiblingIdentityFile(inputPath);
    if (!source) {
        return { identities: new Map() };
    }
    return { ...loadIdentityFile(source), path: source };
}

/**
 * Lists every user with their display name and conversation count.
 * Throws NO_USERS_FOUND when the document references nobody.
 */
export function listUsers(document: ConversationDocument, identities: IdentityMapping): UserListEntry[] {
    const users = extractUsers(document);
    if (users.length === 0) {
        throw new ConversationFilterError("NO_USERS_FOUND", "No users found in the conversation data.");
    }

    return users.map(id => ({
        id,
        displayName: formatDisplayName(id, identities),
        conversationCount: countUserConversations(document, id)
    }));
}

/**
 * The conversations `userId` takes part in. Throws NO_MATCHING_CONVERSATIONS when
 * there are none.
 */
export function selectExportConversations(document: ConversationDocument, userId: UserIdentifier): JsonValue[] {
    const conversations = filterUserConversations(document, userId);
    if (conversations.length === 0) {
        throw new ConversationFilterError(
            "NO_MATCHING_CONVERSATIONS",
            "No conversations found for selected user"
        );
    }
    return conversations;
}

export type WriteRequest = {
    conversations: JsonValue[];
    userId: UserIdentifier;
    identities: IdentityMapping;
    outputPath: string;
    includeHeader: boolean;
    exportDate?: Date;
};

/**
 * Writes already filtered conversations. Throws WRITE_FAILED when the output cannot
 * be written.
 */
export function writeUserConversations(request: WriteRequest): ExportSummary {
    const { conversations, userId, identities, outputPath, includeHeader, exportDate } = request;

    const payload = buildExportPayload(conversations, {
        userId,
        displayName: formatDisplayName(userId, identities),
        includeHeader,
        exportDate
    });

    let bytesWritten: number;
    try {
        bytesWritten = writeJsonFile(outputPath, payload);
    } catch (error) {
        throw new ConversationFilterError("WRITE_FAILED", `Error saving file '${outputPath}'.`, describeError(error));
    }

    return {
        outputPath,
        conversationCount: conversations.length,
        includeHeader,
        bytesWritten
    };
}

export type ExportRequest = Omit<WriteRequest, 'conversations'> & {
    document: ConversationDocument;
};

/**
 * Filters the document down to one user and writes the result. No file is written
 * when the user has nothing to export.
 */
export function exportUserConversations(request: ExportRequest): ExportSummary {
    const { document, ...rest } = request;
    return writeUserConversations({
        ...rest,
        conversations: selectExportConversations(document, request.userId)
    });
}
