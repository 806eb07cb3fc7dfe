/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";

// ============================================================================
// GRAPHEME-AWARE SLICING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Returns the first `count` user-perceived characters of `text`.
 * Never throws when `text` is shorter than `count`.
 */
export function takeGraphemes(text: string, count: number): string {
    if (count <= 0) return '';
    return GRAPHEME_SPLITTER.splitGraphemes(text).slice(0, count).join('');
}

export function graphemeLength(text: string): number {
    return GRAPHEME_SPLITTER.countGraphemes(text);
}

/**
 * Shortens text to `width` characters, ending with "..." when something was cut
 */
export function truncateText(text: string, width: number): string {
    if (graphemeLength(text) <= width) return text;
    if (width <= 3) return takeGraphemes(text, width);
    return takeGraphemes(text, width - 3) + '...';
}

/**
 * Pads on the right, counting grapheme clusters instead of UTF-16 units
 */
export function padEndGraphemes(text: string, width: number): string {
    const missing = width - graphemeLength(text);
    return missing > 0 ? text + ' '.repeat(missing) : text;
}

export function padStartGraphemes(text: string, width: number): string {
    const missing = width - graphemeLength(text);
    return missing > 0 ? ' '.repeat(missing) + text : text;
}

// ============================================================================
// FILE NAMES
// ============================================================================

/**
 * Keeps letters, digits, dashes and underscores; drops everything else
 */
export function sanitiseFileNameComponent(text: string): string {
    return Array.from(text)
        .filter(char => /^[\p{L}\p{N}_-]$/u.test(char))
        .join('');
}

// ============================================================================
// ORDERING
// ============================================================================

/**
 * Orders strings by Unicode code point. The default sort compares UTF-16 code
 * units, which puts characters beyond U+FFFF before U+E000..U+FFFF.
 */
export function compareCodePoints(left: string, right: string): number {
    let index = 0;
    while (index < left.length && index < right.length) {
        const a = left.codePointAt(index) ?? 0;
        const b = right.codePointAt(index) ?? 0;
        if (a !== b) return a - b;
        index += a > 0xffff ? 2 : 1;
    }
    return left.length - right.length;
}
