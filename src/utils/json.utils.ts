/**
 * JSON Value Utilities
 */

import { isLosslessNumber, parse, stringify } from 'lossless-json';
import type { JsonObject, JsonValue } from '../types';

// ============================================================================
// PARSING & SERIALISING
// ============================================================================

/**
 * Parses JSON text keeping every number as written, so integers beyond 2^53 and
 * literals such as `1.0` survive a read and write unchanged.
 */
export function parseJsonText(content: string): JsonValue {
    return toJsonValue(parse(content));
}

/**
 * Serialises with the given indentation; numbers read by `parseJsonText` are
 * written back with their original digits.
 */
export function stringifyJson(value: unknown, indent?: number): string {
    const content = stringify(value, undefined, indent);
    if (content === undefined) {
        throw new TypeError('Value cannot be represented as JSON');
    }
    return content;
}

function toJsonValue(value: unknown): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (isLosslessNumber(value)) {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(toJsonValue);
    }
    if (typeof value === 'object') {
        const record: JsonObject = {};
        for (const [key, entry] of Object.entries(value)) {
            record[key] = toJsonValue(entry);
        }
        return record;
    }
    throw new TypeError(`Unexpected ${typeof value} in parsed JSON`);
}

// ============================================================================
// VALUE HELPERS
// ============================================================================

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Mirrors the loose "has a value" test of JSON consumers: null, false, 0, NaN,
 * "", [] and {} all count as absent.
 */
export function isPresent(value: JsonValue | undefined): boolean {
    if (value === undefined || value === null || value === false || value === '') {
        return false;
    }
    if (typeof value === 'number') {
        return value !== 0 && !Number.isNaN(value);
    }
    if (isLosslessNumber(value)) {
        return Number(value.value) !== 0;
    }
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    if (typeof value === 'object') {
        return Object.keys(value).length > 0;
    }
    return true;
}

/**
 * Returns the value of the first key in `keys` that holds a present value
 */
export function pickFirstPresent(record: JsonObject, keys: readonly string[]): JsonValue | undefined {
    for (const key of keys) {
        const value = Object.hasOwn(record, key) ? record[key] : undefined;
        if (isPresent(value)) {
            return value;
        }
    }
    return undefined;
}

/**
 * String form used for identifier comparison and storage. Parsed numbers keep the
 * digits they were written with.
 */
export function toIdentifierString(value: JsonValue): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
        return String(value);
    }
    if (isLosslessNumber(value)) return value.value;
    return stringifyJson(value);
}
