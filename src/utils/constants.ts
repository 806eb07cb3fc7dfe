/**
 * Constants and Configuration Values
 */

// ============================================================================
// FILE DEFAULTS
// ============================================================================

export const DEFAULT_INPUT_FILE = 'conversations.json';
export const DEFAULT_IDENTITY_FILE = 'users.json';
export const OUTPUT_FILE_PREFIX = 'claude_conversations';
export const OUTPUT_EXTENSION = '.json';

export const JSON_INDENT = 2;

// Length of the identifier prefix shown next to a name or email
export const IDENTIFIER_PREFIX_LENGTH = 8;

// ============================================================================
// FIELD RESOLUTION TABLES
// ============================================================================

/**
 * Conversation-level ownership fields, tried in order
 */
export const CONVERSATION_OWNER_FIELDS = ['user_id', 'userId', 'user', 'author'] as const;

/**
 * Team exports nest the owner under this key, either as an object or a plain value
 */
export const ACCOUNT_FIELD = 'account';

export const ACCOUNT_ID_FIELDS = ['uuid', 'id'] as const;

/**
 * Message-level sender fields, tried in order
 */
export const MESSAGE_SENDER_FIELDS = ['user_id', 'userId', 'user', 'author', 'sender'] as const;

// Individual exports use `messages`, team exports `chat_messages`
export const MESSAGE_CONTAINERS = ['messages', 'chat_messages'] as const;

export const NESTED_CONVERSATIONS_FIELD = 'conversations';

// ============================================================================
// IDENTITY FILE TABLES
// ============================================================================

export const IDENTITY_ID_FIELDS = ['id', 'uuid', 'user_id'] as const;
export const IDENTITY_NAME_FIELDS = ['name', 'display_name', 'full_name'] as const;
export const IDENTITY_EMAIL_FIELDS = ['email', 'email_address'] as const;
