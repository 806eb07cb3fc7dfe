import type { IdentityMapping, JsonValue } from '../types';
import { IDENTIFIER_PREFIX_LENGTH } from '../utils/constants';
import { takeGraphemes } from '../utils/text.utils';
import { normaliseUserId } from './field.resolver';

// ============================================================================
// DISPLAY NAMES
// ============================================================================

/**
 * Builds a readable label for a user identifier.
 *
 * - name and email: `Ada Lovelace (ada@example.com)`
 * - name only:      `Ada Lovelace [a1b2c3d4...]`
 * - email only:     `ada@example.com [a1b2c3d4...]`
 * - otherwise the identifier itself
 */
export function formatDisplayName(userId: JsonValue, identities?: IdentityMapping): string {
    const id = normaliseUserId(userId);
    const identity = identities?.get(id);
    if (!identity) {
        return id;
    }

    const { name, email } = identity;
    if (name && email) {
        return `${name} (${email})`;
    }
    if (name) {
        return `${name} [${shortIdentifier(id)}...]`;
    }
    if (email) {
        return `${email} [${shortIdentifier(id)}...]`;
    }
    return id;
}

export function shortIdentifier(id: string): string {
    return takeGraphemes(id, IDENTIFIER_PREFIX_LENGTH);
}
