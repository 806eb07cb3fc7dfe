import type { IdentityLoadResult, IdentityRecord, JsonObject, JsonValue } from '../types';
import { IDENTITY_EMAIL_FIELDS, IDENTITY_ID_FIELDS, IDENTITY_NAME_FIELDS } from '../utils/constants';
import { describeError, getSystemErrorCode } from '../utils/errors';
import { readUtf8File } from '../utils/file.utils';
import { isJsonObject, parseJsonText, pickFirstPresent, toIdentifierString } from '../utils/json.utils';

// ============================================================================
// IDENTITY FILE PARSER
// ============================================================================

/**
 * Builds the identity mapping from a parsed users file. Two layouts are accepted:
 *
 *   [{ "id": "uuid", "name": "...", "email": "..." }, ...]
 *   { "uuid": { "name": "...", "email": "..." }, ... }
 *
 * Entries that are not objects, or list entries without an identifier, are skipped.
 */
export function parseIdentityRecords(data: JsonValue): Map<string, IdentityRecord> {
    const identities = new Map<string, IdentityRecord>();

    if (Array.isArray(data)) {
        for (const entry of data) {
            if (!isJsonObject(entry)) continue;
            const id = pickFirstPresent(entry, IDENTITY_ID_FIELDS);
            if (id === undefined) continue;
            const key = toIdentifierString(id);
            identities.set(key, buildIdentity(key, entry));
        }
    } else if (isJsonObject(data)) {
        for (const [key, entry] of Object.entries(data)) {
            if (!isJsonObject(entry)) continue;
            identities.set(key, buildIdentity(key, entry));
        }
    }

    return identities;
}

function buildIdentity(id: string, entry: JsonObject): IdentityRecord {
    const identity: IdentityRecord = { id };
    const name = pickFirstPresent(entry, IDENTITY_NAME_FIELDS);
    const email = pickFirstPresent(entry, IDENTITY_EMAIL_FIELDS);
    if (name !== undefined) identity.name = toIdentifierString(name);
    if (email !== undefined) identity.email = toIdentifierString(email);
    return identity;
}

/**
 * Loads the identity file. Never throws: a missing or unreadable file yields an
 * empty mapping together with a note or warning for the caller to show.
 */
export function loadIdentityFile(filePath: string): IdentityLoadResult {
    let content: string;
    try {
        content = readUtf8File(filePath);
    } catch (error) {
        if (getSystemErrorCode(error) === 'ENOENT') {
            return {
                identities: new Map(),
                note: `User info file '${filePath}' not found. Will display user IDs only.`
            };
        }
        return {
            identities: new Map(),
            warning: `Error loading user info: ${describeError(error)}. Will display user IDs only.`
        };
    }

    let data: JsonValue;
    try {
        data = parseJsonText(content);
    } catch {
        return {
            identities: new Map(),
            warning: `Invalid JSON format in '${filePath}'. Will display user IDs only.`
        };
    }

    return { identities: parseIdentityRecords(data) };
}
