import type { ConversationDocument, JsonValue } from '../types';
import { NESTED_CONVERSATIONS_FIELD } from '../utils/constants';
import { isJsonObject } from '../utils/json.utils';

// ============================================================================
// DOCUMENT SHAPE
// ============================================================================

/**
 * Resolves the raw export into its canonical shape. A mapping with a `conversations`
 * key is unwrapped (repeatedly, if nested); any other mapping is keyed by user.
 */
export function normaliseDocument(raw: JsonValue): ConversationDocument {
    let current = raw;

    while (isJsonObject(current) && Object.hasOwn(current, NESTED_CONVERSATIONS_FIELD)) {
        current = current[NESTED_CONVERSATIONS_FIELD];
    }

    if (Array.isArray(current)) {
        return { kind: 'conversation-list', conversations: current };
    }
    if (isJsonObject(current)) {
        return { kind: 'keyed-by-user', users: current };
    }
    return { kind: 'unrecognised' };
}
