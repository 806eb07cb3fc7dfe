/**
 * Conversation Export Type Definitions
 */

import type { LosslessNumber } from 'lossless-json';

// ============================================================================
// RAW JSON
// ============================================================================

/**
 * Numbers read from a file arrive as `LosslessNumber`; plain `number` covers values
 * built in code.
 */
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;

export type JsonObject = { [key: string]: JsonValue };

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

// ============================================================================
// CONVERSATION RECORDS
// ============================================================================

/**
 * Normalised string form of whatever value sits in an ownership field
 */
export type UserIdentifier = string;

/**
 * A conversation record of unknown shape. Ownership may live in `user_id`, `userId`,
 * `user`, `author` or a nested `account`; messages in `messages` and/or `chat_messages`.
 */
export type ConversationRecord = JsonObject;

export type MessageRecord = JsonObject;

export type MessageContainer = 'messages' | 'chat_messages';

// ============================================================================
// CANONICAL DOCUMENT
// ============================================================================

/**
 * Input document resolved once into a single shape.
 *
 * - `conversation-list`: a list of conversations (individual or team export)
 * - `keyed-by-user`: a mapping from user identifier to that user's conversations
 * - `unrecognised`: a scalar root; yields no users
 */
export type ConversationDocument =
    | { kind: 'conversation-list'; conversations: JsonValue[] }
    | { kind: 'keyed-by-user'; users: JsonObject }
    | { kind: 'unrecognised' };
