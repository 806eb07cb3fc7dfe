/**
 * Error Types
 */

export type ConversationFilterErrorCode =
    | "FILE_NOT_FOUND"
    | "INVALID_JSON"
    | "READ_FAILED"
    | "NO_USERS_FOUND"
    | "NO_MATCHING_CONVERSATIONS"
    | "UNKNOWN_USER"
    | "WRITE_FAILED"
    | "INVALID_ARGUMENT";

export class ConversationFilterError extends Error {
    code: ConversationFilterErrorCode;
    details?: string;

    constructor(code: ConversationFilterErrorCode, message: string, details?: string) {
        super(message);
        this.name = "ConversationFilterError";
        this.code = code;
        if (details !== undefined) {
            this.details = details;
        }
    }
}

export function isConversationFilterError(error: unknown): error is ConversationFilterError {
    return error instanceof ConversationFilterError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Node attaches a string `code` (ENOENT, EISDIR, ...) to filesystem errors
 */
export function getSystemErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
