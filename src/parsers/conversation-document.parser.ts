import type { ConversationDocument, JsonValue } from '../types';
import { normaliseDocument } from '../analysis/document.normaliser';
import { ConversationFilterError, describeError, getSystemErrorCode } from '../utils/errors';
import { readUtf8File } from '../utils/file.utils';
import { parseJsonText } from '../utils/json.utils';

// ============================================================================
// CONVERSATION EXPORT PARSER
// ============================================================================

/**
 * Parses export text. Throws INVALID_JSON when the text is not JSON.
 */
export function parseConversationJson(content: string, source: string = 'input'): JsonValue {
    try {
        return parseJsonText(content);
    } catch (error) {
        throw new ConversationFilterError(
            "INVALID_JSON",
            `Invalid JSON format in '${source}'.`,
            describeError(error)
        );
    }
}

/**
 * Loads a conversation export from disk and resolves its shape.
 *
 * Throws FILE_NOT_FOUND when the file is missing, READ_FAILED for other read errors
 * and INVALID_JSON when the content does not parse.
 */
export function loadConversationDocument(filePath: string): ConversationDocument {
    let content: string;
    try {
        content = readUtf8File(filePath);
    } catch (error) {
        if (getSystemErrorCode(error) === 'ENOENT') {
            throw new ConversationFilterError("FILE_NOT_FOUND", `File '${filePath}' not found.`);
        }
        throw new ConversationFilterError("READ_FAILED", `Error loading file '${filePath}'.`, describeError(error));
    }

    return normaliseDocument(parseConversationJson(content, filePath));
}
